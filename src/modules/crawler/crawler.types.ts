/**
 * Crawler Module Types
 */

import type { CrawlSummary, GraphSnapshot, ScopeRule, StopReason } from '../../lib/crawling/crawling.types';
import type { PageRenderer } from '../../lib/rendering/renderer.types';
import type { Reporter } from '../../lib/reporting/reporter.types';
import type { ReporterDispatcher } from '../../lib/reporting/reporter-dispatcher';
import type { ScreenshotWriter } from '../../lib/reporting/screenshot.writer';
import type { SectionWriter } from '../../lib/reporting/section.writer';
import type { ElementDetailWriter } from '../../lib/reporting/element-detail.writer';

// ============================================================================
// Enums
// ============================================================================

export enum CrawlState {
  IDLE = 'idle',
  RUNNING = 'running',
  DRAINING = 'draining', // No new claims; in-flight pages finish
  DONE = 'done',
}

// ============================================================================
// Core Interfaces
// ============================================================================

export interface CrawlOptions {
  seedUrl: string;
  /**
   * Page ceiling, counting succeeded and failed pages. null = unbounded.
   */
  maxPages: number | null;
  /**
   * Deepest link depth still fetched (seed = 0). null = unbounded.
   */
  maxDepth: number | null;
  attemptLimit: number;
  timeoutSeconds: number;
  scope: ScopeRule;
  concurrency: number;
  hangGraceMs?: number;
}

export interface CrawlDependencies {
  renderer: PageRenderer;
  /**
   * Reporters to wrap in a dispatcher, or a ready dispatcher
   */
  reporters: Reporter[] | ReporterDispatcher;
  screenshotWriter?: ScreenshotWriter;
  sectionWriter?: SectionWriter;
  elementWriter?: ElementDetailWriter;
  /**
   * Millisecond clock, injectable for tests
   */
  now?: () => number;
}

export interface CrawlResult {
  graph: GraphSnapshot;
  summary: CrawlSummary;
  stopReason: StopReason;
}
