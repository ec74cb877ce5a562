/**
 * Graph Visualizer Tests
 */

import { findMultiEntryPages, renderMermaid, renderTree } from '../graph.visualizer';
import { GraphBuilder } from '../../crawling/graph-builder';
import { buildSampleGraph } from '../../../__tests__/helpers/fixtures';

describe('renderTree', () => {
  it('should expand each page once and mark cycles and failures', () => {
    expect(renderTree(buildSampleGraph().snapshot())).toEqual([
      '└── example.com/',
      '    └── example.com/about',
      '        └── example.com/ (cyclic)',
      '        └── example.com/contact (failed)',
      '    └── example.com/contact (see above)',
      '    └── other.com/',
    ]);
  });

  it('should limit children per page', () => {
    expect(renderTree(buildSampleGraph().snapshot(), { maxChildren: 1 })).toEqual([
      '└── example.com/',
      '    └── example.com/about',
      '        └── example.com/ (cyclic)',
    ]);
  });

  it('should render nothing for an empty graph', () => {
    expect(renderTree(new GraphBuilder().snapshot())).toEqual([]);
  });
});

describe('renderMermaid', () => {
  it('should declare page nodes, unvisited link nodes and edges', () => {
    expect(renderMermaid(buildSampleGraph().snapshot())).toEqual([
      '```mermaid',
      'graph TD',
      '    page_1["example.com/"]',
      '    page_2["example.com/about"]',
      '    page_3["example.com/contact"]',
      '    link_1["other.com/"]',
      '    page_1-->page_2',
      '    page_1-->page_3',
      '    page_1-->link_1',
      '    page_2-->page_1',
      '    page_2-->page_3',
      '```',
    ]);
  });

  it('should cap edges per source page', () => {
    const lines = renderMermaid(buildSampleGraph().snapshot(), { maxEdgesPerNode: 1 });
    expect(lines.filter((line) => line.includes('-->'))).toEqual(['    page_1-->page_2', '    page_2-->page_1']);
  });

  it('should shorten long labels', () => {
    const graph = new GraphBuilder();
    graph.recordPage({ url: 'https://example.com/a/very/long/path/segment', durationSeconds: 1 });

    expect(renderMermaid(graph.snapshot())[2]).toBe('    page_1["example.com/a/very/long/path/s..."]');
  });
});

describe('findMultiEntryPages', () => {
  it('should list targets linked from several pages', () => {
    expect(findMultiEntryPages(buildSampleGraph().snapshot())).toEqual([
      {
        url: 'https://example.com/contact',
        referrers: ['https://example.com/', 'https://example.com/about'],
      },
    ]);
  });
});
