/**
 * Console Reporter
 * One line per page and a summary block at the end of the run
 */

import { totalElements } from '../crawling/element-inventory';
import type { CrawlEvent, Reporter } from './reporter.types';

export type LogLine = (message: string) => void;

export class ConsoleReporter implements Reporter {
  constructor(private readonly log: LogLine = (message) => console.log(message)) {}

  report(event: CrawlEvent): void {
    switch (event.type) {
      case 'run-started':
        this.log(
          `🕷️  Crawling ${event.seedUrl} with the ${event.renderer} renderer ` +
            `(max pages: ${event.maxPages ?? 'unlimited'}, max depth: ${event.maxDepth ?? 'unlimited'})`
        );
        return;
      case 'page-succeeded': {
        const { record } = event;
        this.log(
          `✅ [${record.pageId}] ${record.url} "${record.title}" ` +
            `(${record.crawlDurationSeconds.toFixed(2)}s, ${totalElements(record.inventory)} elements)`
        );
        return;
      }
      case 'page-failed':
        this.log(`❌ ${event.url}: ${event.errorKind} after ${event.attempts} attempt(s) (${event.message})`);
        return;
      case 'progress':
        if (event.count % 10 === 0) {
          this.log(`📊 Progress: ${event.count} pages, ${event.edgeCount} links`);
        }
        return;
      case 'run-finished': {
        const { summary } = event;
        this.log('='.repeat(60));
        this.log('✅ Crawl Complete');
        this.log('='.repeat(60));
        this.log(`Seed: ${summary.seedUrl}`);
        this.log(`  • Pages succeeded:   ${summary.succeeded}`);
        this.log(`  • Pages failed:      ${summary.failed}`);
        this.log(`  • Links discovered:  ${summary.statistics.linksDiscovered}`);
        this.log(`  • Retries:           ${summary.statistics.retries}`);
        this.log(`  • Stop reason:       ${summary.stopReason}`);
        this.log(`⏱  Duration: ${summary.durationSeconds.toFixed(1)}s`);
        this.log('='.repeat(60));
        return;
      }
    }
  }
}
