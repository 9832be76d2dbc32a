import fs from 'node:fs';
import type { Dispatcher } from 'undici';
import { DEFAULT_QUERY, primarySelector, type Settings, type SourceConfig, type SourceMap } from '../config.js';
import { ConfigError, PolicyBlockedError, describeError, isRetryable } from '../errors.js';
import { dedupe } from '../ingest/dedupe.js';
import type { ContactRecord, Listing, ScrapeStats } from '../types.js';
import { exportCsv } from '../utils/csv.js';
import { createLogger } from '../utils/log.js';
import { BrowserFetcher, launchChromium } from './browser.js';
import { extractListings, findEmail } from './extractors.js';
import { HttpFetcher, fetchWithRetry, type PageFetcher } from './fetcher.js';
import { nextPageUrl, pageKey } from './paginator.js';
import type { RateLimiter } from './rate-limiter.js';
import type { RobotsGuard } from './robots.js';

const log = createLogger('scrape');

export interface ScrapeOptions {
  query?: string;
  /** Cap per source. */
  maxResults?: number;
  /** Replaces the configured start URL of every selected source. */
  startUrl?: string;
}

export interface ScrapeDeps {
  limiter: RateLimiter;
  /** Called once per source; the fetcher is closed when that source is done. */
  createFetcher: (name: string, source: SourceConfig) => PageFetcher;
  retry: { attempts: number; baseDelayMs: number; sleep?: (ms: number) => Promise<void> };
}

/** stopped: no next page or cap reached; aborted: a page failed after retries; blocked: robots.txt. */
export type SourceStatus = 'stopped' | 'aborted' | 'blocked' | 'skipped';

export interface SourceResult {
  source: string;
  status: SourceStatus;
  records: ContactRecord[];
  pages: number;
}

export function startUrlFor(source: SourceConfig, opts: ScrapeOptions): string | undefined {
  if (opts.startUrl) return opts.startUrl;
  if (source.list_url) return source.list_url;
  if (source.search_url_template) {
    return source.search_url_template.replace('{query}', encodeURIComponent(opts.query || DEFAULT_QUERY));
  }
  return undefined;
}

type PageOutcome = { html: string } | { stop: 'aborted' | 'blocked' };

/**
 * Fetch, extract, follow the next-page link; repeat until there is no next
 * page, the next page was already visited, or maxResults records are in.
 */
export async function scrapeSource(
  name: string,
  source: SourceConfig,
  opts: ScrapeOptions,
  deps: ScrapeDeps,
): Promise<SourceResult> {
  const start = startUrlFor(source, opts);
  if (!start) {
    log.error(`[${name}] no search_url_template or list_url configured, skipping`);
    return { source: name, status: 'skipped', records: [], pages: 0 };
  }
  if (source.rate_limit !== undefined || source.jitter !== undefined) {
    deps.limiter.configure(name, source.rate_limit ?? deps.limiter.delayFor(name), source.jitter ?? 0);
  }

  const max = opts.maxResults && opts.maxResults > 0 ? opts.maxResults : Infinity;
  const fetcher = deps.createFetcher(name, source);
  const fetchPage = (url: string) => fetchWithRetry(fetcher, url, { ...deps.retry, source: name, limiter: deps.limiter });

  const tryPage = async (url: string): Promise<PageOutcome> => {
    try {
      return { html: await fetchPage(url) };
    } catch (e) {
      if (e instanceof PolicyBlockedError) {
        log.warn(`[${name}] ${url} disallowed by robots.txt, not retrying`);
        return { stop: 'blocked' };
      }
      if (isRetryable(e)) {
        log.error(`[${name}] giving up on ${url}: ${e.message}`);
      } else {
        log.error(`[${name}] unexpected failure on ${url}: ${describeError(e)}`);
      }
      return { stop: 'aborted' };
    }
  };

  const withEmail = async (listing: Listing): Promise<ContactRecord> => {
    const { record } = listing;
    const detailUrl = listing.detailUrl ?? (source.email_from_website ? record.website : undefined);
    if (record.email || !detailUrl) return record;
    try {
      const email = findEmail(await fetchPage(detailUrl));
      return email ? { ...record, email } : record;
    } catch (e) {
      if (isRetryable(e) || e instanceof PolicyBlockedError) {
        log.debug(`[${name}] no email from ${detailUrl}: ${describeError(e)}`);
      } else {
        log.warn(`[${name}] unexpected failure on ${detailUrl}, leaving email empty: ${describeError(e)}`);
      }
      return record;
    }
  };

  log.info(`[${name}] scraping ${start}`);
  const records: ContactRecord[] = [];
  const visited = new Set<string>();
  let status: SourceStatus = 'stopped';
  let pages = 0;
  let url = start;
  try {
    for (let page = 1; ; page++) {
      visited.add(pageKey(url));
      const outcome = await tryPage(url);
      if ('stop' in outcome) {
        status = outcome.stop;
        break;
      }
      pages++;

      const listings = extractListings(outcome.html, source.selectors, url, {
        curatedList: Boolean(source.list_url),
        baseUrl: source.base_url,
      });
      if (!listings.length) {
        log.info(`[${name}] no listings on page ${page} (${url})`);
        break;
      }
      for (const listing of listings.slice(0, max - records.length)) {
        records.push(await withEmail(listing));
      }
      log.debug(`[${name}] page ${page}: ${listings.length} listings, ${records.length} total`);
      if (records.length >= max) {
        log.info(`[${name}] reached max results (${max})`);
        break;
      }

      const next = nextPageUrl(outcome.html, source.selectors.next_page, url, page, start);
      if (!next) break;
      if (visited.has(pageKey(next))) {
        log.warn(`[${name}] next page ${next} already visited, stopping`);
        break;
      }
      url = next;
    }
  } finally {
    try {
      await fetcher.close?.();
    } catch (e) {
      log.warn(`[${name}] closing the fetcher failed: ${describeError(e)}`);
    }
  }

  log.info(`[${name}] ${status}: ${records.length} records from ${pages} page(s)`);
  return { source: name, status, records, pages };
}

export interface RunOptions extends ScrapeOptions {
  /** Source names; all configured sources when empty. */
  sources?: string[];
  output: string;
  append?: boolean;
}

export interface RunResult {
  results: SourceResult[];
  /** Rows written per output file. */
  exported: Record<string, number>;
  stats: ScrapeStats;
}

export interface RunHooks {
  onSourceStart?: (name: string) => void;
  onSourceDone?: (result: SourceResult) => void;
}

/**
 * Scrapes the selected sources one after another, then dedupes and exports.
 * Sources with their own output_file are appended there; everything else
 * goes to the run's output file.
 *
 * @throws ConfigError for unknown source names, before any request.
 * @throws IOError when an output file cannot be written.
 */
export async function scrapeAll(sources: SourceMap, opts: RunOptions, deps: ScrapeDeps, hooks: RunHooks = {}): Promise<RunResult> {
  const names = opts.sources?.length ? opts.sources : Array.from(sources.keys());
  const unknown = names.filter((n) => !sources.has(n));
  if (unknown.length) {
    throw new ConfigError(`Unknown source(s): ${unknown.join(', ')}. Available: ${Array.from(sources.keys()).join(', ')}`);
  }

  log.info(`Starting scrape from ${names.length} source(s)`);
  const results: SourceResult[] = [];
  const exported: Record<string, number> = {};
  const combined: ContactRecord[] = [];

  for (const name of names) {
    const source = sources.get(name);
    if (!source) continue;
    hooks.onSourceStart?.(name);
    let result: SourceResult;
    try {
      result = await scrapeSource(name, source, opts, deps);
    } catch (e) {
      log.error(`[${name}] scrape failed: ${describeError(e)}`);
      result = { source: name, status: 'aborted', records: [], pages: 0 };
    }
    results.push(result);
    hooks.onSourceDone?.(result);

    if (source.output_file && result.records.length) {
      const unique = dedupe(result.records);
      const existed = fs.existsSync(source.output_file);
      exported[source.output_file] = (exported[source.output_file] ?? 0) + (await exportCsv(unique, source.output_file, 'append'));
      log.info(`[${name}] exported ${unique.length} records to ${source.output_file} (${existed ? 'appended' : 'created'})`);
    } else {
      combined.push(...result.records);
    }
  }

  const unique = dedupe(combined);
  if (combined.length > unique.length) log.info(`Removed ${combined.length - unique.length} duplicate records`);
  if (unique.length) {
    exported[opts.output] = (exported[opts.output] ?? 0) + (await exportCsv(unique, opts.output, opts.append ? 'append' : 'overwrite'));
    log.info(`Exported ${unique.length} records to ${opts.output}`);
  } else if (!Object.keys(exported).length) {
    log.warn('No records found to export');
  }

  const stats: ScrapeStats = {
    sources: results.length,
    pages: results.reduce((n, r) => n + r.pages, 0),
    records: results.reduce((n, r) => n + r.records.length, 0),
    exported: Object.values(exported).reduce((n, c) => n + c, 0),
  };
  return { results, exported, stats };
}

export interface FetcherFactoryOptions {
  settings: Pick<Settings, 'requestTimeoutMs' | 'chromePath' | 'browserWsEndpoint'>;
  robots: RobotsGuard;
  dispatcher?: Dispatcher;
}

/** Plain HTTP for static directories, a headless browser for requires_js sources. */
export function fetcherFactory({ settings, robots, dispatcher }: FetcherFactoryOptions): ScrapeDeps['createFetcher'] {
  return (_name, source) => {
    if (!source.requires_js) return new HttpFetcher({ robots, timeoutMs: settings.requestTimeoutMs, dispatcher });
    return new BrowserFetcher({
      robots,
      waitFor: source.wait_for ?? primarySelector(source.selectors.listing),
      waitTimeoutMs: source.wait_timeout_ms,
      navigationTimeoutMs: settings.requestTimeoutMs,
      launch: launchChromium({ executablePath: settings.chromePath, wsEndpoint: settings.browserWsEndpoint }),
    });
  };
}
