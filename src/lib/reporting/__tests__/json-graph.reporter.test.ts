/**
 * JSON Graph Reporter Tests
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { ZodError } from 'zod';
import { JsonGraphReporter, loadGraph, saveGraph } from '../json-graph.reporter';
import { buildSampleGraph, buildSampleSummary } from '../../../__tests__/helpers/fixtures';

describe('JsonGraphReporter', () => {
  let tempDir: string;
  let graphFile: string;

  beforeEach(async () => {
    tempDir = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'crawl-graph-'));
    graphFile = path.join(tempDir, 'crawl_graph.json');
  });

  afterEach(async () => {
    await fs.promises.rm(tempDir, { recursive: true, force: true });
  });

  it('should write the graph only when the run finishes', async () => {
    const reporter = new JsonGraphReporter(graphFile);
    const graph = buildSampleGraph().snapshot();

    await reporter.report({ type: 'page-succeeded', record: graph.nodes[0] });
    expect(fs.existsSync(graphFile)).toBe(false);

    await reporter.report({ type: 'run-finished', summary: buildSampleSummary(), graph });
    const loaded = await loadGraph(graphFile);

    expect(loaded.seedUrl).toBe('https://example.com/');
    expect(loaded.nodes).toEqual(graph.nodes);
    expect(loaded.edges).toEqual(graph.edges);
    expect(loaded.summary?.stopReason).toBe('frontier-exhausted');
  });

  it('should save a graph without a summary', async () => {
    const graph = buildSampleGraph().snapshot();
    await saveGraph(graphFile, graph);

    const raw = await fs.promises.readFile(graphFile, 'utf-8');
    expect(raw.endsWith('}\n')).toBe(true);
    expect((await loadGraph(graphFile)).summary).toBeUndefined();
  });

  it('should reject edges whose source page is missing', async () => {
    const graph = buildSampleGraph().snapshot();
    await saveGraph(graphFile, { ...graph, edges: [...graph.edges, { sourcePageId: 9, targetUrl: 'https://example.com/x' }] });

    await expect(loadGraph(graphFile)).rejects.toThrow(ZodError);
  });
});
