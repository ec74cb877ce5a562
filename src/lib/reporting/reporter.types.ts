/**
 * Reporter Types
 * Structured events the crawl controller emits while a run progresses
 */

import {
  CrawlSummary,
  ElementInventory,
  GraphSnapshot,
  PageRecord,
  ScopeRule,
  Url,
} from '../crawling/crawling.types';

export interface RunStartedEvent {
  type: 'run-started';
  seedUrl: Url;
  startedAt: string;
  maxPages: number | null;
  maxDepth: number | null;
  attemptLimit: number;
  timeoutSeconds: number;
  scope: ScopeRule;
  renderer: string;
}

export interface PageSucceededEvent {
  type: 'page-succeeded';
  record: PageRecord;
}

export interface PageFailedEvent {
  type: 'page-failed';
  url: Url;
  errorKind: string;
  attempts: number;
  message: string;
  record: PageRecord;
}

export interface ProgressSnapshotEvent {
  type: 'progress';
  /**
   * When the latest page was recorded (ISO 8601)
   */
  timestamp: string;
  /**
   * Pages recorded so far, succeeded and failed
   */
  count: number;
  edgeCount: number;
  latestUrl: Url;
  latestTitle: string;
  inventory: ElementInventory;
  /**
   * Graph as of this event, copied on each call
   */
  snapshot: () => GraphSnapshot;
}

export interface RunFinishedEvent {
  type: 'run-finished';
  summary: CrawlSummary;
  graph: GraphSnapshot;
}

export type CrawlEvent =
  | RunStartedEvent
  | PageSucceededEvent
  | PageFailedEvent
  | ProgressSnapshotEvent
  | RunFinishedEvent;

export type CrawlEventType = CrawlEvent['type'];

/**
 * Renders crawl events to persistent output.
 * Errors thrown here never reach the crawl; see ReporterDispatcher.
 */
export interface Reporter {
  report(event: CrawlEvent): void | Promise<void>;
  close?(): Promise<void>;
}
