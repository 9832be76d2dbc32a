#!/usr/bin/env node
import cliProgress from 'cli-progress';
import { Command, InvalidArgumentError } from 'commander';
import { DEFAULT_QUERY, loadSettings, loadSources, type Settings } from './config.js';
import { ConfigError, describeError } from './errors.js';
import { dedupeCsvFile, mergeCsvDirectory } from './ingest/merge.js';
import { ROBOTS_USER_AGENT, configureHttp } from './scraper/fetcher.js';
import { RateLimiter } from './scraper/rate-limiter.js';
import { RobotsGuard } from './scraper/robots.js';
import { fetcherFactory, scrapeAll } from './scraper/scrape.js';
import { createLogger, setLogLevel } from './utils/log.js';

const log = createLogger('cli');

interface ScrapeCommandOptions {
  sources?: string[];
  query: string;
  maxResults?: number;
  output: string;
  logLevel: string;
  append: boolean;
  url?: string;
  config: string;
  progress: boolean;
}

interface MergeCommandOptions {
  dir: string;
  output: string;
  dedupe: boolean;
}

function positiveInt(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n <= 0) throw new InvalidArgumentError('Expected a positive integer.');
  return n;
}

function applyLogLevel(level: string) {
  try {
    setLogLevel(level);
  } catch (e) {
    throw new ConfigError(describeError(e), { cause: e });
  }
}

async function runScrape(opts: ScrapeCommandOptions, settings: Settings) {
  applyLogLevel(opts.logLevel);
  configureHttp(settings.proxy);
  const sources = loadSources(opts.config);

  const robots = new RobotsGuard({ userAgent: ROBOTS_USER_AGENT, timeoutMs: settings.requestTimeoutMs });
  const limiter = new RateLimiter({ defaultDelay: settings.defaultRateLimit });
  const total = opts.sources?.length ?? sources.size;

  const bar =
    opts.progress && process.stdout.isTTY
      ? new cliProgress.SingleBar(
          { hideCursor: true, format: '[{bar}] {value}/{total} sources | {source} | records:{records}' },
          cliProgress.Presets.shades_classic,
        )
      : null;
  let records = 0;
  bar?.start(total, 0, { source: '', records });

  const run = await scrapeAll(
    sources,
    {
      sources: opts.sources,
      query: opts.query,
      maxResults: opts.maxResults ?? settings.defaultMaxResults,
      startUrl: opts.url,
      output: opts.output,
      append: opts.append,
    },
    {
      limiter,
      createFetcher: fetcherFactory({ settings, robots }),
      retry: { attempts: settings.maxRetries, baseDelayMs: settings.retryBaseDelayMs },
    },
    {
      onSourceStart: (source) => bar?.update({ source }),
      onSourceDone: (result) => {
        records += result.records.length;
        bar?.increment(1, { source: result.source, records });
      },
    },
  ).finally(() => bar?.stop());

  for (const r of run.results) {
    log.info(`${r.source}: ${r.status}, ${r.records.length} records from ${r.pages} page(s)`);
  }
  const files = Object.keys(run.exported);
  log.info(
    `Done: ${run.stats.records} records scraped from ${run.stats.sources} source(s), ` +
      `${run.stats.exported} exported${files.length ? ` to ${files.join(', ')}` : ''}`,
  );
}

async function main() {
  const settings = loadSettings();

  const program = new Command();
  program.name('designer-scraper').description('Collect interior designer contacts from directory websites into CSV');

  program
    .command('scrape', { isDefault: true })
    .description('Scrape the configured directory sources')
    .option('-s, --sources <names...>', 'Source names to scrape (default: all configured)')
    .option('-q, --query <text>', 'Search query for search-based sources', DEFAULT_QUERY)
    .option('-m, --max-results <n>', 'Maximum records per source', positiveInt)
    .option('-o, --output <path>', 'Output CSV file', settings.outputFile)
    .option('-l, --log-level <level>', 'debug, info, warn, error or silent', settings.logLevel)
    .option('-a, --append', 'Append to the output file instead of replacing it', false)
    .option('-u, --url <url>', 'Start from this URL instead of the configured one')
    .option('-c, --config <path>', 'Source configuration file', settings.sourcesConfig)
    .option('--no-progress', 'Hide the progress bar')
    .action((opts: ScrapeCommandOptions) => runScrape(opts, settings));

  program
    .command('merge')
    .description('Combine every CSV in a directory into one master file with a source column')
    .option('-d, --dir <dir>', 'Directory of CSV files', 'output')
    .option('-o, --output <path>', 'Master CSV file', 'output/master_results.csv')
    .option('--no-dedupe', 'Keep duplicate contacts')
    .option('-l, --log-level <level>', 'debug, info, warn, error or silent', settings.logLevel)
    .action(async (opts: MergeCommandOptions & { logLevel: string }) => {
      applyLogLevel(opts.logLevel);
      await mergeCsvDirectory(opts.dir, opts.output, { dedupe: opts.dedupe });
    });

  program
    .command('dedupe')
    .description('Remove duplicate contacts from CSV files in place')
    .argument('<files...>', 'CSV files to clean')
    .option('-l, --log-level <level>', 'debug, info, warn, error or silent', settings.logLevel)
    .action(async (files: string[], opts: { logLevel: string }) => {
      applyLogLevel(opts.logLevel);
      for (const file of files) await dedupeCsvFile(file);
    });

  await program.parseAsync(process.argv);
}

main().catch((e: unknown) => {
  log.error(describeError(e));
  process.exitCode = 1;
});
