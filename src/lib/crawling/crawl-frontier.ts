/**
 * Crawl Frontier
 * Breadth-first queue of pending URLs plus the in-flight and visited sets.
 * A normalized URL is handed out by next() at most once per run.
 */

import { FrontierEntry, FrontierState, ScopeRule, Url } from './crawling.types';
import { inScope, normalizeUrl, tryNormalizeUrl } from './url-normalizer';

export type OfferOutcome = 'queued' | 'known' | 'out-of-scope' | 'too-deep' | 'invalid';

export interface CrawlFrontierOptions {
  seedUrl: string;
  scope?: ScopeRule;
  /**
   * Deepest depth still queued (seed = 0). Unbounded when omitted.
   */
  maxDepth?: number;
}

export class CrawlFrontier {
  readonly seedUrl: Url;
  private readonly scope: ScopeRule;
  private readonly maxDepth: number;
  // Seed plus the hosts it redirected to
  private readonly scopeRoots: Url[];

  private queue: FrontierEntry[] = [];
  private queued: Set<Url> = new Set();
  private inFlight: Set<Url> = new Set();
  private visited: Set<Url> = new Set();

  constructor(options: CrawlFrontierOptions) {
    this.seedUrl = normalizeUrl(options.seedUrl);
    this.scopeRoots = [this.seedUrl];
    this.scope = options.scope ?? { type: 'same-host' };
    this.maxDepth = options.maxDepth ?? Number.POSITIVE_INFINITY;
  }

  /**
   * Add a URL to the back of the queue unless it is already known or not crawlable
   */
  offer(url: string, depth: number = 0, parentUrl?: Url): OfferOutcome {
    const normalized = tryNormalizeUrl(url);
    if (normalized === null) {
      return 'invalid';
    }

    if (this.isKnown(normalized)) {
      return 'known';
    }

    if (!this.inScope(normalized)) {
      return 'out-of-scope';
    }

    if (depth > this.maxDepth) {
      return 'too-deep';
    }

    this.queue.push({ url: normalized, depth, parentUrl, discoveredAt: new Date() });
    this.queued.add(normalized);
    return 'queued';
  }

  /**
   * Claim the next URL (FIFO for BFS) and mark it in-flight.
   * Returns null when nothing is queued.
   */
  next(): FrontierEntry | null {
    const entry = this.queue.shift();
    if (!entry) {
      return null;
    }

    this.queued.delete(entry.url);
    this.inFlight.add(entry.url);
    return entry;
  }

  /**
   * Move a claimed URL to visited, whatever the fetch outcome.
   * Returns false if the URL was not in flight.
   */
  markVisited(url: Url): boolean {
    if (!this.inFlight.delete(url)) {
      return false;
    }

    this.visited.add(url);
    return true;
  }

  /**
   * Treat the host of a URL like the seed host from now on.
   * Returns false if the URL is invalid or its host is already in scope.
   */
  extendScope(url: string): boolean {
    const normalized = tryNormalizeUrl(url);
    if (normalized === null || this.inScope(normalized)) {
      return false;
    }

    this.scopeRoots.push(normalized);
    return true;
  }

  inScope(url: Url): boolean {
    return this.scopeRoots.some((root) => inScope(url, root, this.scope));
  }

  isKnown(url: Url): boolean {
    return this.queued.has(url) || this.inFlight.has(url) || this.visited.has(url);
  }

  hasVisited(url: Url): boolean {
    return this.visited.has(url);
  }

  /**
   * Check if queue is empty
   */
  isEmpty(): boolean {
    return this.queue.length === 0;
  }

  /**
   * Get queue size
   */
  size(): number {
    return this.queue.length;
  }

  inFlightCount(): number {
    return this.inFlight.size;
  }

  visitedCount(): number {
    return this.visited.size;
  }

  /**
   * Number of distinct URLs ever accepted; never decreases during a run
   */
  knownCount(): number {
    return this.queued.size + this.inFlight.size + this.visited.size;
  }

  getVisitedUrls(): Url[] {
    return Array.from(this.visited);
  }

  getState(): FrontierState {
    return {
      queued: this.queue.map((entry) => entry.url),
      inFlight: Array.from(this.inFlight),
      visited: Array.from(this.visited),
    };
  }
}
