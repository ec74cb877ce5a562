/**
 * Crawler Service
 * Builds a crawl run from a validated configuration:
 * renderer (Playwright or HTTP) + reporters (console, markdown log, JSON graph) + screenshots and element details
 */

import * as path from 'path';
import { CrawlConfig } from '../../config/crawl-config';
import { HttpRenderer } from '../../lib/rendering/http.renderer';
import { PlaywrightRenderer } from '../../lib/rendering/playwright.renderer';
import type { PageRenderer } from '../../lib/rendering/renderer.types';
import { ConsoleReporter } from '../../lib/reporting/console.reporter';
import { JsonGraphReporter } from '../../lib/reporting/json-graph.reporter';
import { MarkdownReporter } from '../../lib/reporting/markdown.reporter';
import type { Reporter } from '../../lib/reporting/reporter.types';
import { FileElementDetailWriter } from '../../lib/reporting/element-detail.writer';
import { FileScreenshotWriter } from '../../lib/reporting/screenshot.writer';
import { FileSectionWriter } from '../../lib/reporting/section.writer';
import { CrawlController } from './crawler.controller';
import { CrawlResult } from './crawler.types';

export const CRAWL_LOG_FILE = 'crawl_log.md';
export const CRAWL_GRAPH_FILE = 'crawl_graph.json';
export const SCREENSHOT_DIR = 'screenshots';
export const ELEMENTS_DIR = 'elements';

export interface CrawlerServiceOverrides {
  renderer?: PageRenderer;
  reporters?: Reporter[];
}

export class CrawlerService {
  private controller: CrawlController | null = null;

  createRenderer(config: CrawlConfig): PageRenderer {
    if (config.renderer === 'http') {
      return new HttpRenderer();
    }
    return new PlaywrightRenderer({
      headless: config.headless,
      screenshots: config.screenshots,
      sectionScreenshots: config.sectionScreenshots,
      elementDetails: config.elementDetails,
    });
  }

  createReporters(config: CrawlConfig): Reporter[] {
    return [
      new ConsoleReporter(),
      new MarkdownReporter(path.join(config.outputDir, CRAWL_LOG_FILE), {
        progressEvery: config.progressEvery,
      }),
      new JsonGraphReporter(path.join(config.outputDir, CRAWL_GRAPH_FILE)),
    ];
  }

  /**
   * Run one crawl to completion. The renderer is closed afterwards, also on failure.
   */
  async crawl(config: CrawlConfig, overrides: CrawlerServiceOverrides = {}): Promise<CrawlResult> {
    const renderer = overrides.renderer ?? this.createRenderer(config);
    const reporters = overrides.reporters ?? this.createReporters(config);
    const screenshotWriter = config.screenshots
      ? new FileScreenshotWriter(path.join(config.outputDir, SCREENSHOT_DIR), SCREENSHOT_DIR)
      : undefined;
    const sectionWriter =
      config.screenshots && config.sectionScreenshots
        ? new FileSectionWriter(path.join(config.outputDir, SCREENSHOT_DIR), SCREENSHOT_DIR)
        : undefined;
    const elementWriter = config.elementDetails
      ? new FileElementDetailWriter(path.join(config.outputDir, ELEMENTS_DIR), ELEMENTS_DIR)
      : undefined;

    try {
      const controller = new CrawlController(
        {
          seedUrl: config.seedUrl,
          maxPages: config.maxPages,
          maxDepth: config.maxDepth,
          attemptLimit: config.attemptLimit,
          timeoutSeconds: config.timeoutSeconds,
          scope: config.scope,
          concurrency: config.concurrency,
        },
        { renderer, reporters, screenshotWriter, sectionWriter, elementWriter }
      );
      this.controller = controller;
      return await controller.run();
    } finally {
      this.controller = null;
      if (renderer.close) {
        await renderer.close();
      }
    }
  }

  /**
   * Ask the running crawl to drain. Returns false when nothing is running.
   */
  stop(): boolean {
    if (!this.controller) {
      return false;
    }
    this.controller.stop();
    return true;
  }
}

export const crawlerService = new CrawlerService();
