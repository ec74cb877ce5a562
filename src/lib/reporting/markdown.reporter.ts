/**
 * Markdown Reporter
 * Human-readable crawl log: one entry per page, periodic progress sections and a final summary
 */

import * as fs from 'fs';
import * as path from 'path';
import { PageRecord } from '../crawling/crawling.types';
import { summarizeInventory } from '../crawling/element-inventory';
import { formatDateTime } from './format';
import { findMultiEntryPages, renderMermaid, renderTree } from './graph.visualizer';
import type {
  CrawlEvent,
  PageFailedEvent,
  ProgressSnapshotEvent,
  Reporter,
  RunFinishedEvent,
  RunStartedEvent,
} from './reporter.types';

export interface MarkdownReporterOptions {
  /**
   * Write a progress section every N progress events (1 = after every page)
   */
  progressEvery?: number;
}

export class MarkdownReporter implements Reporter {
  private readonly progressEvery: number;
  private progressEvents: number = 0;

  constructor(
    private readonly logFile: string,
    options: MarkdownReporterOptions = {}
  ) {
    this.progressEvery = Math.max(1, options.progressEvery ?? 1);
  }

  async report(event: CrawlEvent): Promise<void> {
    switch (event.type) {
      case 'run-started':
        await fs.promises.mkdir(path.dirname(this.logFile), { recursive: true });
        await fs.promises.writeFile(this.logFile, formatRunStarted(event), 'utf-8');
        return;
      case 'page-succeeded':
        await this.append(formatPageEntry(event.record));
        return;
      case 'page-failed':
        await this.append(formatFailure(event));
        return;
      case 'progress':
        this.progressEvents++;
        if (this.progressEvents % this.progressEvery === 0) {
          await this.append(formatProgress(event));
        }
        return;
      case 'run-finished':
        await this.append(formatSummary(event));
        return;
    }
  }

  private async append(text: string): Promise<void> {
    await fs.promises.appendFile(this.logFile, text, 'utf-8');
  }
}

export function formatRunStarted(event: RunStartedEvent): string {
  const scope =
    event.scope.type === 'allow-list'
      ? `allow-list (${event.scope.domains.join(', ') || 'seed host only'})`
      : 'same-host';

  return [
    '# Crawl Log',
    '',
    `- **Seed**: ${event.seedUrl}`,
    `- **Started**: ${formatDateTime(new Date(event.startedAt))}`,
    `- **Renderer**: ${event.renderer}`,
    `- **Scope**: ${scope}`,
    `- **Max Pages**: ${event.maxPages ?? 'unlimited'}`,
    `- **Max Depth**: ${event.maxDepth ?? 'unlimited'}`,
    `- **Attempts Per Page**: ${event.attemptLimit}`,
    `- **Timeout Per Attempt**: ${event.timeoutSeconds} seconds`,
    '',
    '',
  ].join('\n');
}

export function formatPageEntry(record: PageRecord): string {
  const lines = [
    `## Page: ${record.url}`,
    `**Page ID**: ${record.pageId}`,
    `**Title**: ${record.title || '(untitled)'}`,
    `**Time**: ${formatDateTime(new Date(record.timestamp))}`,
    `**Processing Time**: ${record.crawlDurationSeconds.toFixed(2)} seconds`,
    `**Attempts**: ${record.attempts}`,
    `**Page Dimensions**: ${record.dimensions.width}x${record.dimensions.height} pixels`,
    `**Screenshot**: ${record.screenshotPath ? `\`${record.screenshotPath}\`` : 'not captured'}`,
    ...(record.sectionsPath ? [`**Section Screenshots**: \`${record.sectionsPath}\``] : []),
    ...(record.elementsPath ? [`**Element Details**: \`${record.elementsPath}\``] : []),
    '',
  ];

  const elements = summarizeInventory(record.inventory);
  if (elements.length > 0) {
    lines.push('### Interactive Elements', ...elements.map(({ label, count }) => `- ${label}: ${count}`), '');
  }

  return `\n${lines.join('\n')}\n`;
}

export function formatFailure(event: PageFailedEvent): string {
  return [
    '',
    `## ❌ Failed: ${event.url}`,
    `**Error**: ${event.errorKind}: ${event.message}`,
    `**Attempts**: ${event.attempts}`,
    '',
    '---',
    '',
  ].join('\n');
}

export function formatProgress(event: ProgressSnapshotEvent): string {
  const lines = [
    '',
    '---',
    '',
    `## Current Progress - ${formatDateTime(new Date(event.timestamp))}`,
    `- Pages Crawled So Far: ${event.count}`,
    `- Latest Page: ${event.latestUrl}`,
    `- Latest Title: ${event.latestTitle || '(untitled)'}`,
    '',
  ];

  const elements = summarizeInventory(event.inventory);
  if (elements.length > 0) {
    lines.push('### Interactive Elements Found', ...elements.map(({ label, count }) => `- ${label}: ${count}`), '');
  }

  const graph = event.snapshot();
  lines.push('### Site Tree', '```', ...renderTree(graph), '```', '');
  lines.push('### Link Graph', ...renderMermaid(graph), '');

  const multiEntry = findMultiEntryPages(graph);
  if (multiEntry.length > 0) {
    lines.push('### Pages with Multiple Entry Points');
    for (const page of multiEntry) {
      lines.push('', `#### ${page.url}`, 'Accessible from:', ...page.referrers.map((ref) => `- ${ref}`));
    }
    lines.push('');
  }

  return lines.join('\n');
}

export function formatSummary(event: RunFinishedEvent): string {
  const { summary } = event;
  const lines = [
    '',
    '---',
    '',
    '## Crawl Summary',
    `- **Finished**: ${formatDateTime(new Date(summary.finishedAt))}`,
    `- **Duration**: ${summary.durationSeconds.toFixed(2)} seconds`,
    `- **Stop Reason**: ${summary.stopReason}`,
    `- **Pages Succeeded**: ${summary.succeeded}`,
    `- **Pages Failed**: ${summary.failed}`,
    `- **Links Discovered**: ${summary.statistics.linksDiscovered}`,
    `- **Edges**: ${event.graph.edges.length}`,
    '',
  ];

  const failed = event.graph.nodes.filter((node) => node.status === 'failed');
  if (failed.length > 0) {
    lines.push('### Failed');
    for (const node of failed) {
      lines.push(`- ${node.url} (${node.errorKind ?? 'UNKNOWN'}, ${node.attempts} attempt(s))`);
    }
    lines.push('');
  }

  return lines.join('\n');
}
