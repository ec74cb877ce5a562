#!/usr/bin/env node

/**
 * CLI Entry Point
 * site-crawler <seed-url> [options]
 *
 * Also the library entry: crawl components can be imported from here.
 */

import { Command } from 'commander';
import { CrawlConfigInput, resolveCrawlConfig } from './config/crawl-config';
import { crawlerService } from './modules/crawler/crawler.service';
import { ConfigurationError, errorMessage } from './lib/rendering/errors';

export * from './lib/crawling';
export * from './lib/rendering';
export * from './lib/reporting';
export * from './config/crawl-config';
export * from './modules/crawler/crawler.types';
export { CrawlController } from './modules/crawler/crawler.controller';
export { CrawlerService, crawlerService } from './modules/crawler/crawler.service';

export interface CliOptions {
  maxPages?: string;
  maxDepth?: string;
  attempts?: string;
  timeout?: string;
  scope?: string;
  allow?: string[];
  concurrency?: string;
  output?: string;
  renderer?: string;
  screenshots: boolean;
  sections?: boolean;
  elementDetails?: boolean;
  headed?: boolean;
  progressEvery?: string;
}

function toNumber(value: string | undefined): number | undefined {
  return value === undefined ? undefined : Number(value);
}

/**
 * Translate CLI flags into config input; validation happens in resolveCrawlConfig
 */
export function cliOptionsToConfig(seedUrl: string, options: CliOptions): CrawlConfigInput {
  const allowedDomains = options.allow?.flatMap((value) => value.split(','));
  const scope = options.scope ?? (allowedDomains && allowedDomains.length > 0 ? 'allow-list' : undefined);

  return {
    seedUrl,
    maxPages: toNumber(options.maxPages),
    maxDepth: toNumber(options.maxDepth),
    attemptLimit: toNumber(options.attempts),
    timeoutSeconds: toNumber(options.timeout),
    scope: scope === 'same-host' || scope === 'allow-list' ? scope : undefined,
    allowedDomains,
    concurrency: toNumber(options.concurrency),
    outputDir: options.output,
    renderer: options.renderer === 'http' || options.renderer === 'playwright' ? options.renderer : undefined,
    screenshots: options.screenshots ? undefined : false,
    sectionScreenshots: options.sections ? true : undefined,
    elementDetails: options.elementDetails === false ? false : undefined,
    headless: options.headed ? false : undefined,
    progressEvery: toNumber(options.progressEvery),
  };
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name('site-crawler')
    .description('Breadth-first site crawler: link graph, element inventory and screenshots')
    .version('1.0.0')
    .argument('<seed-url>', 'URL to start crawling from')
    .option('-m, --max-pages <number>', 'Maximum pages to visit, failed pages included')
    .option('-d, --max-depth <number>', 'Maximum link depth from the seed page')
    .option('-a, --attempts <number>', 'Attempts per page before giving up on timeouts')
    .option('-t, --timeout <seconds>', 'Timeout per attempt in seconds')
    .option('-s, --scope <scope>', 'Link scope (same-host|allow-list)')
    .option('--allow <domains...>', 'Extra domains to crawl (implies allow-list scope)')
    .option('-c, --concurrency <number>', 'Pages rendered at the same time')
    .option('-o, --output <dir>', 'Output directory for the log, graph and screenshots')
    .option('-r, --renderer <renderer>', 'Page renderer (playwright|http)')
    .option('--progress-every <number>', 'Write a progress section every N pages')
    .option('--no-screenshots', 'Do not capture screenshots')
    .option('--sections', 'Also capture one screenshot per viewport section')
    .option('--no-element-details', 'Do not export element positions')
    .option('--headed', 'Show the browser window')
    .action(async (seedUrl: string, options: CliOptions) => {
      await main(seedUrl, options);
    });

  return program;
}

async function main(seedUrl: string, options: CliOptions): Promise<void> {
  if (options.scope !== undefined && options.scope !== 'same-host' && options.scope !== 'allow-list') {
    throw new ConfigurationError([`scope: expected same-host or allow-list, got "${options.scope}"`]);
  }
  if (options.renderer !== undefined && options.renderer !== 'http' && options.renderer !== 'playwright') {
    throw new ConfigurationError([`renderer: expected playwright or http, got "${options.renderer}"`]);
  }

  const config = resolveCrawlConfig(cliOptionsToConfig(seedUrl, options));

  const onSignal = (signal: NodeJS.Signals): void => {
    console.log(`\n🛑 ${signal} received: finishing pages in flight...`);
    crawlerService.stop();
  };
  process.once('SIGINT', onSignal);
  process.once('SIGTERM', onSignal);

  try {
    const result = await crawlerService.crawl(config);
    console.log(
      `📁 Output written to ${config.outputDir} ` +
        `(${result.summary.succeeded} pages, stop reason: ${result.stopReason})`
    );
  } finally {
    process.off('SIGINT', onSignal);
    process.off('SIGTERM', onSignal);
  }
}

if (require.main === module) {
  createProgram()
    .parseAsync(process.argv)
    .catch((error: unknown) => {
      console.error(`❌ Crawl failed: ${errorMessage(error)}`);
      process.exit(1);
    });
}
