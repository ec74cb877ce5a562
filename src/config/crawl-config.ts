/**
 * Crawl run configuration
 * Validated once, before any page is fetched
 */

import { z } from 'zod';
import { env } from './env';
import { ScopeRule, Url } from '../lib/crawling/crawling.types';
import { tryNormalizeUrl } from '../lib/crawling/url-normalizer';
import { ConfigurationError } from '../lib/rendering/errors';

export const RendererTypeSchema = z.enum(['playwright', 'http']);
export const ScopeTypeSchema = z.enum(['same-host', 'allow-list']);

export const CrawlConfigSchema = z
  .object({
    seedUrl: z.string({ required_error: 'seed URL is required' }).trim().min(1, 'seed URL is required'),
    maxPages: z.number().int().positive('max pages must be a positive integer').nullable(),
    maxDepth: z.number().int().nonnegative('max depth must not be negative').nullable(),
    attemptLimit: z.number().int().positive('max attempts must be a positive integer'),
    timeoutSeconds: z.number().positive('timeout must be a positive number of seconds'),
    scope: ScopeTypeSchema,
    allowedDomains: z.array(z.string().trim().min(1)),
    concurrency: z.number().int().positive().max(16),
    renderer: RendererTypeSchema,
    outputDir: z.string().min(1),
    screenshots: z.boolean(),
    sectionScreenshots: z.boolean(),
    elementDetails: z.boolean(),
    headless: z.boolean(),
    progressEvery: z.number().int().positive(),
  })
  .transform((config, ctx) => {
    const seedUrl = tryNormalizeUrl(config.seedUrl);
    if (seedUrl === null) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['seedUrl'],
        message: `"${config.seedUrl}" is not a valid http(s) URL`,
      });
      return z.NEVER;
    }

    const scope: ScopeRule =
      config.scope === 'allow-list'
        ? { type: 'allow-list', domains: config.allowedDomains.map((domain) => domain.toLowerCase()) }
        : { type: 'same-host' };

    const { allowedDomains: _allowedDomains, ...rest } = config;
    return { ...rest, seedUrl, scope };
  });

export type CrawlConfigInput = Partial<z.input<typeof CrawlConfigSchema>> & { seedUrl: string };

export interface CrawlConfig {
  seedUrl: Url;
  maxPages: number | null;
  maxDepth: number | null;
  attemptLimit: number;
  timeoutSeconds: number;
  scope: ScopeRule;
  concurrency: number;
  renderer: z.infer<typeof RendererTypeSchema>;
  outputDir: string;
  screenshots: boolean;
  sectionScreenshots: boolean;
  elementDetails: boolean;
  headless: boolean;
  progressEvery: number;
}

/**
 * Defaults taken from the environment (.env)
 */
export function defaultCrawlConfig(): Omit<z.input<typeof CrawlConfigSchema>, 'seedUrl'> {
  return {
    maxPages: env.CRAWL_MAX_PAGES,
    maxDepth: env.CRAWL_MAX_DEPTH,
    attemptLimit: env.MAX_ATTEMPTS,
    timeoutSeconds: env.PAGE_TIMEOUT_SECONDS,
    scope: env.CRAWL_SCOPE === 'allow-list' ? 'allow-list' : 'same-host',
    allowedDomains: env.CRAWL_ALLOWED_DOMAINS.split(',')
      .map((domain) => domain.trim())
      .filter((domain) => domain.length > 0),
    concurrency: env.CRAWL_CONCURRENCY,
    renderer: env.RENDERER === 'http' ? 'http' : 'playwright',
    outputDir: env.OUTPUT_DIR,
    screenshots: env.SCREENSHOT_ENABLED,
    sectionScreenshots: env.SCREENSHOT_SECTIONS,
    elementDetails: env.ELEMENT_DETAILS,
    headless: env.HEADLESS,
    progressEvery: env.PROGRESS_EVERY,
  };
}

/**
 * Merge options over the environment defaults and validate.
 *
 * @throws ConfigurationError listing every invalid option
 */
export function resolveCrawlConfig(input: CrawlConfigInput): CrawlConfig {
  const merged = { ...defaultCrawlConfig() };
  for (const [key, value] of Object.entries(input)) {
    if (value !== undefined) {
      Object.assign(merged, { [key]: value });
    }
  }

  const result = CrawlConfigSchema.safeParse(merged);
  if (!result.success) {
    throw new ConfigurationError(
      result.error.issues.map((issue) =>
        issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
      )
    );
  }

  return result.data;
}
