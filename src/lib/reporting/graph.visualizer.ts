/**
 * Graph Visualizer
 * Text renderings of a graph snapshot for the crawl log
 */

import { GraphSnapshot, PageId, PageRecord, Url } from '../crawling/crawling.types';
import { shortUrl } from './format';

export interface TreeOptions {
  /**
   * Children listed per page, in URL order
   */
  maxChildren?: number;
}

export interface MermaidOptions {
  maxEdgesPerNode?: number;
}

export interface MultiEntryPage {
  url: Url;
  referrers: Url[];
}

const MERMAID_LABEL_LENGTH = 30;

/**
 * Tree of the crawl rooted at the seed. A page's children are expanded once;
 * later occurrences are marked `(see above)` and back-links `(cyclic)`.
 */
export function renderTree(graph: GraphSnapshot, options: TreeOptions = {}): string[] {
  const maxChildren = options.maxChildren ?? 5;
  if (!graph.seedUrl) {
    return [];
  }

  const pages = indexPages(graph);
  const children = groupTargets(graph);
  const expanded = new Set<Url>();
  const ancestors = new Set<Url>();
  const lines: string[] = [];

  const walk = (url: Url, indent: number): void => {
    const line = `${'    '.repeat(indent)}└── ${shortUrl(url)}`;

    if (ancestors.has(url)) {
      lines.push(`${line} (cyclic)`);
      return;
    }
    if (expanded.has(url)) {
      lines.push(`${line} (see above)`);
      return;
    }

    const page = pages.get(url);
    lines.push(page?.status === 'failed' ? `${line} (failed)` : line);
    if (!page) {
      return;
    }

    expanded.add(url);
    ancestors.add(url);
    const targets = [...(children.get(page.pageId) ?? [])].sort().slice(0, maxChildren);
    for (const target of targets) {
      walk(target, indent + 1);
    }
    ancestors.delete(url);
  };

  walk(graph.seedUrl, 0);
  return lines;
}

/**
 * Mermaid flowchart with one node per recorded page and per linked-but-unvisited URL
 */
export function renderMermaid(graph: GraphSnapshot, options: MermaidOptions = {}): string[] {
  const maxEdgesPerNode = options.maxEdgesPerNode ?? 3;
  const nodeLines: string[] = [];
  const edgeLines: string[] = [];
  const nodeIds = new Map<Url, string>();

  for (const node of graph.nodes) {
    const id = `page_${node.pageId}`;
    nodeIds.set(node.url, id);
    nodeLines.push(`    ${id}["${mermaidLabel(node.url)}"]`);
  }

  const edgesPerSource = new Map<PageId, number>();
  let linkCount = 0;
  for (const edge of graph.edges) {
    const used = edgesPerSource.get(edge.sourcePageId) ?? 0;
    if (used >= maxEdgesPerNode) {
      continue;
    }
    edgesPerSource.set(edge.sourcePageId, used + 1);

    let targetId = nodeIds.get(edge.targetUrl);
    if (!targetId) {
      targetId = `link_${++linkCount}`;
      nodeIds.set(edge.targetUrl, targetId);
      nodeLines.push(`    ${targetId}["${mermaidLabel(edge.targetUrl)}"]`);
    }
    edgeLines.push(`    page_${edge.sourcePageId}-->${targetId}`);
  }

  return ['```mermaid', 'graph TD', ...nodeLines, ...edgeLines, '```'];
}

/**
 * URLs linked from more than one recorded page, sorted by URL
 */
export function findMultiEntryPages(graph: GraphSnapshot): MultiEntryPage[] {
  const urlsById = new Map<PageId, Url>(graph.nodes.map((node) => [node.pageId, node.url]));
  const referrers = new Map<Url, Set<Url>>();

  for (const edge of graph.edges) {
    const source = urlsById.get(edge.sourcePageId);
    if (!source) continue;

    let sources = referrers.get(edge.targetUrl);
    if (!sources) {
      sources = new Set();
      referrers.set(edge.targetUrl, sources);
    }
    sources.add(source);
  }

  return Array.from(referrers.entries())
    .filter(([, sources]) => sources.size > 1)
    .map(([url, sources]) => ({ url, referrers: Array.from(sources).sort() }))
    .sort((a, b) => (a.url < b.url ? -1 : a.url > b.url ? 1 : 0));
}

function indexPages(graph: GraphSnapshot): Map<Url, PageRecord> {
  return new Map(graph.nodes.map((node) => [node.url, node]));
}

function groupTargets(graph: GraphSnapshot): Map<PageId, Url[]> {
  const children = new Map<PageId, Url[]>();
  for (const edge of graph.edges) {
    const targets = children.get(edge.sourcePageId);
    if (targets) {
      targets.push(edge.targetUrl);
    } else {
      children.set(edge.sourcePageId, [edge.targetUrl]);
    }
  }
  return children;
}

function mermaidLabel(url: Url): string {
  const short = shortUrl(url, Number.MAX_SAFE_INTEGER);
  const label = short.length > MERMAID_LABEL_LENGTH ? `${short.slice(0, MERMAID_LABEL_LENGTH)}...` : short;
  return label.replace(/"/g, '#quot;');
}
