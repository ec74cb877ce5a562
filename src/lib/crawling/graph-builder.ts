/**
 * Graph Builder
 * Owns page records (by PageId) and the de-duplicated edge set of one crawl run
 */

import {
  Edge,
  ElementInventory,
  GraphSnapshot,
  PageDimensions,
  PageId,
  PageRecord,
  PageStatus,
  Url,
} from './crawling.types';
import { emptyInventory } from './element-inventory';
import { normalizeUrl } from './url-normalizer';

export interface RecordPageInput {
  url: string;
  title?: string;
  dimensions?: PageDimensions;
  inventory?: ElementInventory;
  durationSeconds: number;
  status?: PageStatus;
  depth?: number;
  attempts?: number;
  errorKind?: string;
  errorMessage?: string;
  screenshotPath?: string;
  sectionsPath?: string;
  elementsPath?: string;
  timestamp?: Date;
}

export class GraphBuilder {
  private seedUrl: Url | null;
  private nextPageId: PageId = 1;
  private pageIds: Map<Url, PageId> = new Map();
  private records: Map<PageId, PageRecord> = new Map();
  private edges: Edge[] = [];
  private edgeKeys: Set<string> = new Set();

  constructor(seedUrl?: string) {
    this.seedUrl = seedUrl ? normalizeUrl(seedUrl) : null;
  }

  /**
   * Store the record for a page. The first record of a URL gets a new PageId;
   * later records of the same URL keep it and replace the stored fields.
   */
  recordPage(input: RecordPageInput): PageId {
    const url = normalizeUrl(input.url);

    let pageId = this.pageIds.get(url);
    if (pageId === undefined) {
      pageId = this.nextPageId++;
      this.pageIds.set(url, pageId);
    }
    if (this.seedUrl === null) {
      this.seedUrl = url;
    }

    const record: PageRecord = Object.freeze({
      pageId,
      url,
      title: input.title ?? '',
      dimensions: Object.freeze({ ...(input.dimensions ?? { width: 0, height: 0 }) }),
      inventory: Object.freeze({ ...(input.inventory ?? emptyInventory()) }),
      crawlDurationSeconds: input.durationSeconds,
      timestamp: (input.timestamp ?? new Date()).toISOString(),
      status: input.status ?? 'success',
      depth: input.depth ?? 0,
      attempts: input.attempts ?? 1,
      errorKind: input.errorKind,
      errorMessage: input.errorMessage,
      screenshotPath: input.screenshotPath,
      sectionsPath: input.sectionsPath,
      elementsPath: input.elementsPath,
    });

    this.records.set(pageId, record);
    return pageId;
  }

  /**
   * Record a link from a recorded page. Returns false if the same edge already exists.
   *
   * @throws Error when the source page has not been recorded
   * @throws InvalidUrlError when the target cannot be normalized
   */
  recordEdge(sourcePageId: PageId, targetUrl: string): boolean {
    if (!this.records.has(sourcePageId)) {
      throw new Error(`Cannot record edge from unknown page ${sourcePageId}`);
    }

    const target = normalizeUrl(targetUrl);
    const key = `${sourcePageId} ${target}`;
    if (this.edgeKeys.has(key)) {
      return false;
    }

    this.edgeKeys.add(key);
    this.edges.push(Object.freeze({ sourcePageId, targetUrl: target }));
    return true;
  }

  /**
   * Read-only copy of the graph so far, nodes ordered by PageId and edges by insertion
   */
  snapshot(): GraphSnapshot {
    return this.copyGraph(this.nextPageId - 1, this.edges.length);
  }

  /**
   * Snapshot of the graph as it is now, copied only when the returned function is called.
   * Pages and edges added later are left out.
   */
  deferredSnapshot(): () => GraphSnapshot {
    const lastPageId = this.nextPageId - 1;
    const edgeCount = this.edges.length;
    return () => this.copyGraph(lastPageId, edgeCount);
  }

  getPageId(url: string): PageId | undefined {
    return this.pageIds.get(normalizeUrl(url));
  }

  getRecord(pageId: PageId): PageRecord | undefined {
    return this.records.get(pageId);
  }

  size(): number {
    return this.records.size;
  }

  edgeCount(): number {
    return this.edges.length;
  }

  countByStatus(): Record<PageStatus, number> {
    const counts: Record<PageStatus, number> = { success: 0, failed: 0 };
    for (const record of this.records.values()) {
      counts[record.status]++;
    }
    return counts;
  }

  private copyGraph(lastPageId: PageId, edgeCount: number): GraphSnapshot {
    const nodes = Array.from(this.records.values())
      .filter((record) => record.pageId <= lastPageId)
      .sort((a, b) => a.pageId - b.pageId)
      .map((record) => ({
        ...record,
        dimensions: { ...record.dimensions },
        inventory: { ...record.inventory },
      }));

    return {
      seedUrl: this.seedUrl,
      nodes,
      edges: this.edges.slice(0, edgeCount).map((edge) => ({ ...edge })),
    };
  }
}
