/**
 * Crawling Statistics Tracker
 * Track comprehensive crawling statistics
 */

import { CrawlingStatistics } from './crawling.types';

export class CrawlingStatisticsTracker {
  private startTime: number;
  private endTime: number | null = null;
  private pagesSucceeded: number = 0;
  private pagesFailed: number = 0;
  private linksSkipped: number = 0;
  private linksDiscovered: number = 0;
  private duplicatesDetected: number = 0;
  private retries: number = 0;
  private maxDepthReached: number = 0;
  private pageTimes: number[] = [];

  constructor(private readonly now: () => number = Date.now) {
    this.startTime = this.now();
  }

  /**
   * Record a successful page visit
   */
  recordPageSuccess(depth: number, time: number): void {
    this.pagesSucceeded++;
    this.maxDepthReached = Math.max(this.maxDepthReached, depth);
    this.pageTimes.push(time);
  }

  /**
   * Record a failed page
   */
  recordPageFailure(depth: number, time: number): void {
    this.pagesFailed++;
    this.maxDepthReached = Math.max(this.maxDepthReached, depth);
    this.pageTimes.push(time);
  }

  recordSkipped(count: number = 1): void {
    this.linksSkipped += count;
  }

  /**
   * Record link discovery
   */
  recordLinkDiscovery(count: number): void {
    this.linksDiscovered += count;
  }

  /**
   * Record duplicate detection
   */
  recordDuplicate(count: number = 1): void {
    this.duplicatesDetected += count;
  }

  recordRetry(): void {
    this.retries++;
  }

  /**
   * Freeze totalTime at the end of the run
   */
  finish(): void {
    if (this.endTime === null) {
      this.endTime = this.now();
    }
  }

  /**
   * Get final statistics
   */
  getStatistics(): CrawlingStatistics {
    const totalTime = (this.endTime ?? this.now()) - this.startTime;
    const averagePageTime =
      this.pageTimes.length > 0
        ? this.pageTimes.reduce((sum, time) => sum + time, 0) / this.pageTimes.length
        : 0;

    const totalAttempts = this.pagesSucceeded + this.pagesFailed;
    const successRate = totalAttempts > 0 ? this.pagesSucceeded / totalAttempts : 0;

    return {
      pagesSucceeded: this.pagesSucceeded,
      pagesFailed: this.pagesFailed,
      linksSkipped: this.linksSkipped,
      linksDiscovered: this.linksDiscovered,
      duplicatesDetected: this.duplicatesDetected,
      retries: this.retries,
      depthReached: this.maxDepthReached,
      totalTime,
      averagePageTime,
      successRate,
    };
  }
}
