/**
 * Test Fixtures
 * Reusable test data
 */

import { CrawlingStatisticsTracker } from '../../lib/crawling/crawling-statistics';
import { CrawlSummary, DetectedElement } from '../../lib/crawling/crawling.types';
import { createInventory } from '../../lib/crawling/element-inventory';
import { GraphBuilder } from '../../lib/crawling/graph-builder';

/**
 * Page with a known element inventory:
 * 3 buttons, 2 visible links, 3 inputs, 1 select, 1 checkbox, 2 radio buttons,
 * 1 clickable, 1 iframe, 1 menu, 1 tooltip, 1 modal, 1 expandable (18 total)
 */
export const inventoryHtml = `
<!DOCTYPE html>
<html>
<head>
  <title>Inventory Page</title>
</head>
<body>
  <nav role="menubar">
    <a href="/home">Home</a>
    <a href="/about" title="About us">About</a>
  </nav>
  <button>Save</button>
  <input type="submit" value="Send">
  <input type="text" name="q">
  <input name="plain">
  <textarea name="notes"></textarea>
  <select name="size"><option>S</option></select>
  <input type="checkbox" name="agree">
  <input type="radio" name="r" value="1">
  <input type="radio" name="r" value="2">
  <div role="button">Fake button</div>
  <iframe src="/frame"></iframe>
  <div role="dialog" class="modal"></div>
  <button aria-expanded="false">More</button>
  <div hidden><button>Hidden</button></div>
  <div style="display: none"><a href="/secret">Secret</a></div>
</body>
</html>
`;

/**
 * Seed page whose links exercise normalization, scope and resource filtering
 */
export const seedPageHtml = `
<!DOCTYPE html>
<html>
<head>
  <title>Example Home</title>
</head>
<body>
  <a href="/a">Section A</a>
  <a href="https://other.com/x">Elsewhere</a>
  <a href="/a#frag">Section A again</a>
  <a href="mailto:team@example.com">Mail</a>
  <a href="/files/report.pdf">Report</a>
  <a href="">Empty</a>
</body>
</html>
`;

export const seedLinks = ['/a', 'https://other.com/x', '/a#frag'];

/**
 * Elements of a 2400px page seen through an 800px viewport:
 * a button across the first section break, a link in the third section and a zero-height button
 */
export const detectedElements: DetectedElement[] = [
  {
    category: 'buttons',
    tagName: 'button',
    text: 'Sign up',
    attributes: { id: 'signup' },
    box: { x: 40, y: 780, width: 120, height: 40 },
  },
  {
    category: 'links',
    tagName: 'a',
    text: 'Pricing',
    attributes: { href: '/pricing' },
    box: { x: 10, y: 1700, width: 200, height: 20 },
  },
  {
    category: 'buttons',
    tagName: 'button',
    text: '',
    attributes: {},
    box: { x: 0, y: 0, width: 30, height: 0 },
  },
];

/**
 * Small crawl graph:
 * home (1) → about, contact, other.com; about (2) → home, contact; contact (3) failed
 */
export function buildSampleGraph(): GraphBuilder {
  const graph = new GraphBuilder('https://example.com/');
  const timestamp = new Date('2024-03-05T09:07:03.000Z');

  const home = graph.recordPage({
    url: 'https://example.com/',
    title: 'Home',
    dimensions: { width: 1280, height: 2400 },
    inventory: createInventory({ buttons: 2, links: 3 }),
    durationSeconds: 1.5,
    timestamp,
  });
  const about = graph.recordPage({
    url: 'https://example.com/about',
    title: 'About',
    durationSeconds: 0.75,
    depth: 1,
    timestamp,
  });
  graph.recordPage({
    url: 'https://example.com/contact',
    durationSeconds: 3,
    status: 'failed',
    depth: 1,
    attempts: 3,
    errorKind: 'TIMEOUT_EXHAUSTED',
    errorMessage: 'Page unreachable after 3 attempt(s): https://example.com/contact',
    timestamp,
  });

  graph.recordEdge(home, 'https://example.com/about');
  graph.recordEdge(home, 'https://example.com/contact');
  graph.recordEdge(home, 'https://other.com/');
  graph.recordEdge(about, 'https://example.com/');
  graph.recordEdge(about, 'https://example.com/contact');

  return graph;
}

export function buildSampleSummary(overrides: Partial<CrawlSummary> = {}): CrawlSummary {
  return {
    seedUrl: 'https://example.com/',
    startedAt: '2024-03-05T09:07:00.000Z',
    finishedAt: '2024-03-05T09:07:12.000Z',
    durationSeconds: 12,
    succeeded: 2,
    failed: 1,
    stopReason: 'frontier-exhausted',
    statistics: new CrawlingStatisticsTracker(() => 0).getStatistics(),
    ...overrides,
  };
}
