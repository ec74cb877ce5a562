/**
 * JSON Graph Reporter
 * Persists the final crawl graph and summary, and reads them back
 */

import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { CrawlSummary, GraphSnapshot } from '../crawling/crawling.types';
import type { CrawlEvent, Reporter } from './reporter.types';

const InventorySchema = z.object({
  buttons: z.number().int().nonnegative(),
  links: z.number().int().nonnegative(),
  inputs: z.number().int().nonnegative(),
  selects: z.number().int().nonnegative(),
  checkboxes: z.number().int().nonnegative(),
  radioButtons: z.number().int().nonnegative(),
  clickable: z.number().int().nonnegative(),
  iframes: z.number().int().nonnegative(),
  tabs: z.number().int().nonnegative(),
  menus: z.number().int().nonnegative(),
  tooltips: z.number().int().nonnegative(),
  modals: z.number().int().nonnegative(),
  expandable: z.number().int().nonnegative(),
});

const PageRecordSchema = z.object({
  pageId: z.number().int().positive(),
  url: z.string().url(),
  title: z.string(),
  dimensions: z.object({ width: z.number(), height: z.number() }),
  inventory: InventorySchema,
  crawlDurationSeconds: z.number().nonnegative(),
  timestamp: z.string(),
  status: z.enum(['success', 'failed']),
  depth: z.number().int().nonnegative(),
  attempts: z.number().int().nonnegative(),
  errorKind: z.string().optional(),
  errorMessage: z.string().optional(),
  screenshotPath: z.string().optional(),
  sectionsPath: z.string().optional(),
  elementsPath: z.string().optional(),
});

const EdgeSchema = z.object({
  sourcePageId: z.number().int().positive(),
  targetUrl: z.string().url(),
});

export const PersistedGraphSchema = z
  .object({
    seedUrl: z.string().url().nullable(),
    nodes: z.array(PageRecordSchema),
    edges: z.array(EdgeSchema),
    summary: z
      .object({
        succeeded: z.number(),
        failed: z.number(),
        stopReason: z.enum(['frontier-exhausted', 'page-limit', 'stopped']),
        durationSeconds: z.number(),
      })
      .passthrough()
      .optional(),
  })
  .superRefine((graph, ctx) => {
    const ids = new Set(graph.nodes.map((node) => node.pageId));
    graph.edges.forEach((edge, index) => {
      if (!ids.has(edge.sourcePageId)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['edges', index, 'sourcePageId'],
          message: `Edge source ${edge.sourcePageId} has no page record`,
        });
      }
    });
  });

export type PersistedGraph = z.infer<typeof PersistedGraphSchema>;

export class JsonGraphReporter implements Reporter {
  constructor(private readonly graphFile: string) {}

  async report(event: CrawlEvent): Promise<void> {
    if (event.type !== 'run-finished') {
      return;
    }
    await saveGraph(this.graphFile, event.graph, event.summary);
  }
}

export async function saveGraph(
  graphFile: string,
  graph: GraphSnapshot,
  summary?: CrawlSummary
): Promise<void> {
  await fs.promises.mkdir(path.dirname(graphFile), { recursive: true });
  await writeJson(graphFile, { ...graph, summary });
}

/**
 * Pretty-printed JSON with a trailing newline
 */
export async function writeJson(file: string, value: unknown): Promise<void> {
  await fs.promises.writeFile(file, `${JSON.stringify(value, null, 2)}\n`, 'utf-8');
}

/**
 * Read a persisted graph; throws a ZodError if the file does not match the schema
 */
export async function loadGraph(graphFile: string): Promise<PersistedGraph> {
  const raw = await fs.promises.readFile(graphFile, 'utf-8');
  return PersistedGraphSchema.parse(JSON.parse(raw));
}
