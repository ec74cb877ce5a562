/**
 * Reporter Dispatcher
 * Delivers crawl events to reporters in order without blocking the crawl.
 * A failing reporter is logged on the fallback channel and skipped.
 */

import { ReporterError } from '../rendering/errors';
import type { CrawlEvent, Reporter } from './reporter.types';

export type ReporterFallback = (error: ReporterError) => void;

export const logReporterError: ReporterFallback = (error) => {
  console.error(`⚠️  ${error.message}`);
};

export class ReporterDispatcher {
  private readonly reporters: Reporter[];
  private readonly fallback: ReporterFallback;
  private queue: Promise<void> = Promise.resolve();
  private failures: number = 0;

  constructor(reporters: Reporter | Reporter[], fallback: ReporterFallback = logReporterError) {
    this.reporters = Array.isArray(reporters) ? reporters : [reporters];
    this.fallback = fallback;
  }

  /**
   * Queue an event for every reporter and return immediately
   */
  dispatch(event: CrawlEvent): void {
    this.queue = this.queue.then(() => this.deliver(event));
  }

  /**
   * Route a failure from another output writer (screenshots) to the fallback channel
   */
  reportFailure(operation: string, cause: unknown): void {
    this.failures++;
    this.fallback(new ReporterError(operation, cause));
  }

  /**
   * Wait until every queued event has been delivered
   */
  async flush(): Promise<void> {
    await this.queue;
  }

  /**
   * Flush, then close reporters that hold resources
   */
  async close(): Promise<void> {
    await this.flush();
    for (const reporter of this.reporters) {
      if (!reporter.close) continue;
      try {
        await reporter.close();
      } catch (error) {
        this.reportFailure('close', error);
      }
    }
  }

  failureCount(): number {
    return this.failures;
  }

  private async deliver(event: CrawlEvent): Promise<void> {
    for (const reporter of this.reporters) {
      try {
        await reporter.report(event);
      } catch (error) {
        this.reportFailure(event.type, error);
      }
    }
  }
}
