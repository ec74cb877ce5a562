/**
 * Crawl Controller
 * Drives one crawl run: claims URLs from the frontier, renders them with retry,
 * records pages and edges, and emits events to the reporters.
 *
 * State: idle → running → draining → done. Draining starts when the page ceiling
 * is reached or stop() is called; pages already in flight still finish.
 */

import { CrawlFrontier } from '../../lib/crawling/crawl-frontier';
import { CrawlingStatisticsTracker } from '../../lib/crawling/crawling-statistics';
import { FrontierEntry, PageId, StopReason } from '../../lib/crawling/crawling.types';
import { describeElements, ElementDetail } from '../../lib/crawling/element-details';
import { GraphBuilder } from '../../lib/crawling/graph-builder';
import { linkDiscoverer } from '../../lib/crawling/link-discoverer';
import { fetchWithRetry, FetchOutcome } from '../../lib/crawling/retry-policy';
import { classifyError, CrawlError } from '../../lib/rendering/errors';
import type { PageRenderer, RenderResult } from '../../lib/rendering/renderer.types';
import { ReporterDispatcher } from '../../lib/reporting/reporter-dispatcher';
import type { ElementDetailWriter } from '../../lib/reporting/element-detail.writer';
import type { ScreenshotWriter } from '../../lib/reporting/screenshot.writer';
import type { SectionWriter } from '../../lib/reporting/section.writer';
import { CrawlDependencies, CrawlOptions, CrawlResult, CrawlState } from './crawler.types';

export class CrawlController {
  private state: CrawlState = CrawlState.IDLE;
  private readonly frontier: CrawlFrontier;
  private readonly graph: GraphBuilder;
  private readonly stats: CrawlingStatisticsTracker;
  private readonly dispatcher: ReporterDispatcher;
  private readonly renderer: PageRenderer;
  private readonly screenshotWriter?: ScreenshotWriter;
  private readonly sectionWriter?: SectionWriter;
  private readonly elementWriter?: ElementDetailWriter;
  private readonly now: () => number;

  private claimed: number = 0;
  private drainReason: StopReason | null = null;

  constructor(
    private readonly options: CrawlOptions,
    deps: CrawlDependencies
  ) {
    this.frontier = new CrawlFrontier({
      seedUrl: options.seedUrl,
      scope: options.scope,
      maxDepth: options.maxDepth ?? undefined,
    });
    this.graph = new GraphBuilder(this.frontier.seedUrl);
    this.now = deps.now ?? Date.now;
    this.stats = new CrawlingStatisticsTracker(this.now);
    this.dispatcher =
      deps.reporters instanceof ReporterDispatcher ? deps.reporters : new ReporterDispatcher(deps.reporters);
    this.renderer = deps.renderer;
    this.screenshotWriter = deps.screenshotWriter;
    this.sectionWriter = deps.sectionWriter;
    this.elementWriter = deps.elementWriter;
  }

  getState(): CrawlState {
    return this.state;
  }

  /**
   * Stop claiming new pages. The run resolves once in-flight pages finish.
   */
  stop(): void {
    if (this.state === CrawlState.RUNNING) {
      this.beginDraining('stopped');
    } else if (this.state === CrawlState.IDLE) {
      this.drainReason = 'stopped';
    }
  }

  /**
   * Crawl until the frontier is exhausted, the ceiling is reached or stop() is called
   */
  async run(): Promise<CrawlResult> {
    if (this.state !== CrawlState.IDLE) {
      throw new Error(`Crawl cannot be started from state "${this.state}"`);
    }

    const startedAt = new Date(this.now());
    this.state = this.drainReason === null ? CrawlState.RUNNING : CrawlState.DRAINING;

    this.dispatcher.dispatch({
      type: 'run-started',
      seedUrl: this.frontier.seedUrl,
      startedAt: startedAt.toISOString(),
      maxPages: this.options.maxPages,
      maxDepth: this.options.maxDepth,
      attemptLimit: this.options.attemptLimit,
      timeoutSeconds: this.options.timeoutSeconds,
      scope: this.options.scope,
      renderer: this.renderer.name,
    });

    this.frontier.offer(this.frontier.seedUrl, 0);
    await this.crawlLoop();

    this.stats.finish();
    const finishedAt = new Date(this.now());
    const stopReason: StopReason = this.drainReason ?? 'frontier-exhausted';
    const counts = this.graph.countByStatus();
    const graph = this.graph.snapshot();
    const summary = {
      seedUrl: this.frontier.seedUrl,
      startedAt: startedAt.toISOString(),
      finishedAt: finishedAt.toISOString(),
      durationSeconds: (finishedAt.getTime() - startedAt.getTime()) / 1000,
      succeeded: counts.success,
      failed: counts.failed,
      stopReason,
      statistics: this.stats.getStatistics(),
    };

    this.dispatcher.dispatch({ type: 'run-finished', summary, graph });
    await this.dispatcher.close();
    const failures = this.dispatcher.failureCount();
    if (failures > 0) {
      console.warn(`⚠️  ${failures} output write(s) failed during the crawl`);
    }
    this.state = CrawlState.DONE;

    return { graph, summary, stopReason };
  }

  private async crawlLoop(): Promise<void> {
    const concurrency = Math.max(1, this.options.concurrency);
    const active = new Set<Promise<void>>();

    for (;;) {
      while (this.state === CrawlState.RUNNING && active.size < concurrency && !this.frontier.isEmpty()) {
        if (this.options.maxPages !== null && this.claimed >= this.options.maxPages) {
          this.beginDraining('page-limit');
          break;
        }

        const entry = this.frontier.next();
        if (!entry) break;

        this.claimed++;
        const task: Promise<void> = this.visit(entry).finally(() => {
          active.delete(task);
        });
        active.add(task);
      }

      if (active.size === 0) {
        return;
      }
      await Promise.race(active);
    }
  }

  private beginDraining(reason: StopReason): void {
    if (this.drainReason === null) {
      this.drainReason = reason;
    }
    this.state = CrawlState.DRAINING;
  }

  private async visit(entry: FrontierEntry): Promise<void> {
    const startedAt = this.now();
    let retries = 0;

    try {
      let outcome: FetchOutcome;
      try {
        outcome = await fetchWithRetry(this.renderer, entry.url, {
          attemptLimit: this.options.attemptLimit,
          timeoutMs: this.options.timeoutSeconds * 1000,
          hangGraceMs: this.options.hangGraceMs,
          onRetry: (attempt, error) => {
            retries++;
            this.stats.recordRetry();
            console.warn(`🔄 Retry ${attempt}/${this.options.attemptLimit - 1} for ${entry.url}: ${error.message}`);
          },
        });
      } catch (error) {
        const classified = classifyError(error, entry.url, this.options.timeoutSeconds * 1000);
        this.recordFailure(entry, classified, retries + 1, startedAt);
        return;
      }

      if (outcome.ok) {
        await this.recordSuccess(entry, outcome.result, outcome.attempts, startedAt);
      } else {
        this.recordFailure(entry, outcome.error, outcome.attempts, startedAt);
      }
    } finally {
      this.frontier.markVisited(entry.url);
    }
  }

  private async recordSuccess(
    entry: FrontierEntry,
    result: RenderResult,
    attempts: number,
    startedAt: number
  ): Promise<void> {
    const finishedAt = this.now();
    const durationSeconds = (finishedAt - startedAt) / 1000;
    const screenshotPath = await this.saveScreenshot(entry, result, finishedAt);
    const details =
      result.elements && result.viewport ? describeElements(result.elements, result.viewport.height) : undefined;
    const sectionsPath = await this.saveSections(entry, result, details ?? [], finishedAt);
    const elementsPath = await this.saveElementDetails(entry, result, details, finishedAt);

    const pageId = this.graph.recordPage({
      url: entry.url,
      title: result.title,
      dimensions: { width: result.widthPx, height: result.heightPx },
      inventory: result.inventory,
      durationSeconds,
      status: 'success',
      depth: entry.depth,
      attempts,
      screenshotPath,
      sectionsPath,
      elementsPath,
      timestamp: new Date(finishedAt),
    });
    this.stats.recordPageSuccess(entry.depth, finishedAt - startedAt);

    this.followLinks(pageId, entry, result);

    const record = this.graph.getRecord(pageId);
    if (record) {
      this.dispatcher.dispatch({ type: 'page-succeeded', record });
    }
    this.dispatchProgress(entry, result.title, pageId);
  }

  /**
   * Record an edge for every valid link and offer it to the frontier.
   * Links resolve against the final URL after redirects; a seed that redirects
   * to another host brings that host into scope.
   */
  private followLinks(pageId: PageId, entry: FrontierEntry, result: RenderResult): void {
    if (entry.depth === 0 && result.finalUrl && this.frontier.extendScope(result.finalUrl)) {
      console.log(`↪️  Seed redirected to ${result.finalUrl}, crawling its host as the seed host`);
    }

    const discovered = linkDiscoverer.discoverLinks(result.links, result.finalUrl ?? entry.url);
    this.stats.recordLinkDiscovery(discovered.links.length);
    this.stats.recordSkipped(discovered.invalid.length + discovered.resources.length);
    this.stats.recordDuplicate(discovered.duplicates);

    for (const link of discovered.links) {
      this.graph.recordEdge(pageId, link);

      const offered = this.frontier.offer(link, entry.depth + 1, entry.url);
      if (offered === 'known') {
        this.stats.recordDuplicate();
      } else if (offered !== 'queued') {
        this.stats.recordSkipped();
      }
    }
  }

  private recordFailure(entry: FrontierEntry, error: CrawlError, attempts: number, startedAt: number): void {
    const finishedAt = this.now();
    const pageId = this.graph.recordPage({
      url: entry.url,
      durationSeconds: (finishedAt - startedAt) / 1000,
      status: 'failed',
      depth: entry.depth,
      attempts,
      errorKind: error.type,
      errorMessage: error.message,
      timestamp: new Date(finishedAt),
    });
    this.stats.recordPageFailure(entry.depth, finishedAt - startedAt);

    const record = this.graph.getRecord(pageId);
    if (record) {
      this.dispatcher.dispatch({
        type: 'page-failed',
        url: entry.url,
        errorKind: error.type,
        attempts,
        message: error.message,
        record,
      });
    }
    this.dispatchProgress(entry, '', pageId);
  }

  private dispatchProgress(entry: FrontierEntry, title: string, pageId: PageId): void {
    const record = this.graph.getRecord(pageId);
    if (!record) return;

    this.dispatcher.dispatch({
      type: 'progress',
      timestamp: record.timestamp,
      count: this.graph.size(),
      edgeCount: this.graph.edgeCount(),
      latestUrl: entry.url,
      latestTitle: title,
      inventory: { ...record.inventory },
      snapshot: this.graph.deferredSnapshot(),
    });
  }

  private async saveScreenshot(
    entry: FrontierEntry,
    result: RenderResult,
    takenAt: number
  ): Promise<string | undefined> {
    if (!result.screenshot || !this.screenshotWriter) {
      return undefined;
    }

    try {
      return await this.screenshotWriter.save(entry.url, result.screenshot, new Date(takenAt));
    } catch (error) {
      this.dispatcher.reportFailure('screenshot', error);
      return undefined;
    }
  }

  private async saveSections(
    entry: FrontierEntry,
    result: RenderResult,
    details: ElementDetail[],
    takenAt: number
  ): Promise<string | undefined> {
    if (!result.sections || !result.viewport || !this.sectionWriter) {
      return undefined;
    }

    try {
      return await this.sectionWriter.save(
        entry.url,
        {
          viewport: result.viewport,
          page: { width: result.widthPx, height: result.heightPx },
          sections: result.sections,
          elements: details,
        },
        new Date(takenAt)
      );
    } catch (error) {
      this.dispatcher.reportFailure('section screenshots', error);
      return undefined;
    }
  }

  private async saveElementDetails(
    entry: FrontierEntry,
    result: RenderResult,
    details: ElementDetail[] | undefined,
    takenAt: number
  ): Promise<string | undefined> {
    if (!details || !result.viewport || !this.elementWriter) {
      return undefined;
    }

    try {
      return await this.elementWriter.save(entry.url, result.viewport, details, new Date(takenAt));
    } catch (error) {
      this.dispatcher.reportFailure('element details', error);
      return undefined;
    }
  }
}
