/**
 * Crawling Types
 * Type definitions for the crawl frontier, page records and link graph
 */

/**
 * Normalized URL string. Only values returned by normalizeUrl() are used as identities.
 */
export type Url = string;

/**
 * Stable per-run node key, assigned by GraphBuilder on first record
 */
export type PageId = number;

/**
 * Counts of interactive elements found on a rendered page
 */
export interface ElementInventory {
  buttons: number;
  links: number;
  inputs: number;
  selects: number;
  checkboxes: number;
  radioButtons: number;
  clickable: number;
  iframes: number;
  tabs: number;
  menus: number;
  tooltips: number;
  modals: number;
  expandable: number;
}

export type ElementCategory = keyof ElementInventory;

export interface PageDimensions {
  width: number;
  height: number;
}

/**
 * Element box in document coordinates (CSS pixels from the top-left of the page)
 */
export interface ElementBox {
  x: number;
  y: number;
  width: number;
  height: number;
}

/**
 * Visible interactive element found on a rendered page
 */
export interface DetectedElement {
  category: ElementCategory;
  tagName: string;
  text: string;
  attributes: Record<string, string>;
  box: ElementBox;
}

export type PageStatus = 'success' | 'failed';

/**
 * Outcome of one page visit. Created once the fetch terminates and never mutated.
 */
export interface PageRecord {
  readonly pageId: PageId;
  readonly url: Url;
  readonly title: string;
  readonly dimensions: Readonly<PageDimensions>;
  readonly inventory: Readonly<ElementInventory>;
  readonly crawlDurationSeconds: number;
  /**
   * ISO-8601 time the fetch terminated
   */
  readonly timestamp: string;
  readonly status: PageStatus;
  /**
   * Crawl depth (0 = seed page)
   */
  readonly depth: number;
  readonly attempts: number;
  readonly errorKind?: string;
  readonly errorMessage?: string;
  readonly screenshotPath?: string;
  /**
   * Directory of viewport-sized section screenshots
   */
  readonly sectionsPath?: string;
  /**
   * Element detail export (positions, sizes, sections)
   */
  readonly elementsPath?: string;
}

/**
 * Directed link from a visited page to a discovered URL.
 * The target may never be visited (scope or ceiling).
 */
export interface Edge {
  readonly sourcePageId: PageId;
  readonly targetUrl: Url;
}

export interface GraphSnapshot {
  seedUrl: Url | null;
  nodes: PageRecord[];
  edges: Edge[];
}

/**
 * Which discovered links are eligible for crawling
 */
export type ScopeRule =
  | { type: 'same-host' }
  | {
      type: 'allow-list';
      /**
       * Hosts allowed in addition to the seed host; subdomains match too
       */
      domains: string[];
    };

/**
 * Frontier entry
 */
export interface FrontierEntry {
  url: Url;
  /**
   * Crawl depth (0 = seed page)
   */
  depth: number;
  /**
   * Where this link was discovered
   */
  parentUrl?: Url;
  discoveredAt: Date;
}

export interface FrontierState {
  queued: Url[];
  inFlight: Url[];
  visited: Url[];
}

/**
 * Crawling statistics interface
 */
export interface CrawlingStatistics {
  pagesSucceeded: number;
  pagesFailed: number;
  /**
   * Links dropped before reaching the frontier (invalid, out of scope, too deep)
   */
  linksSkipped: number;
  linksDiscovered: number;
  /**
   * Links that normalized to a URL the frontier already knew
   */
  duplicatesDetected: number;
  retries: number;
  depthReached: number;
  /**
   * Total crawling time in milliseconds
   */
  totalTime: number;
  /**
   * Average time per page in milliseconds
   */
  averagePageTime: number;
  /**
   * Success rate (0-1)
   */
  successRate: number;
}

/**
 * Why a run moved to done
 */
export type StopReason = 'frontier-exhausted' | 'page-limit' | 'stopped';

export interface CrawlSummary {
  seedUrl: Url;
  startedAt: string;
  finishedAt: string;
  durationSeconds: number;
  succeeded: number;
  failed: number;
  stopReason: StopReason;
  statistics: CrawlingStatistics;
}
