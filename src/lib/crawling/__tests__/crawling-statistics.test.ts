/**
 * Crawling Statistics Tests
 */

import { CrawlingStatisticsTracker } from '../crawling-statistics';

describe('CrawlingStatisticsTracker', () => {
  it('should start with zeroed statistics', () => {
    const tracker = new CrawlingStatisticsTracker(() => 1000);

    expect(tracker.getStatistics()).toEqual({
      pagesSucceeded: 0,
      pagesFailed: 0,
      linksSkipped: 0,
      linksDiscovered: 0,
      duplicatesDetected: 0,
      retries: 0,
      depthReached: 0,
      totalTime: 0,
      averagePageTime: 0,
      successRate: 0,
    });
  });

  it('should aggregate page outcomes, links and retries', () => {
    let now = 1000;
    const tracker = new CrawlingStatisticsTracker(() => now);

    tracker.recordPageSuccess(0, 200);
    tracker.recordPageSuccess(2, 400);
    tracker.recordPageFailure(1, 600);
    tracker.recordLinkDiscovery(5);
    tracker.recordSkipped();
    tracker.recordSkipped(2);
    tracker.recordDuplicate(3);
    tracker.recordRetry();
    now = 4000;
    tracker.finish();
    now = 9000;

    const stats = tracker.getStatistics();
    expect(stats.pagesSucceeded).toBe(2);
    expect(stats.pagesFailed).toBe(1);
    expect(stats.linksDiscovered).toBe(5);
    expect(stats.linksSkipped).toBe(3);
    expect(stats.duplicatesDetected).toBe(3);
    expect(stats.retries).toBe(1);
    expect(stats.depthReached).toBe(2);
    expect(stats.totalTime).toBe(3000);
    expect(stats.averagePageTime).toBe(400);
    expect(stats.successRate).toBeCloseTo(2 / 3);
  });
});
