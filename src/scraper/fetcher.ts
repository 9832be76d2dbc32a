import { fetch as undiciFetch, setGlobalDispatcher, ProxyAgent, type Dispatcher } from 'undici';
import { HttpError, NetworkError, PolicyBlockedError, describeError, isRetryable } from '../errors.js';
import { createLogger } from '../utils/log.js';
import type { RateLimiter } from './rate-limiter.js';
import type { RobotsGuard } from './robots.js';

const log = createLogger('fetch');

export const USER_AGENTS = [
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/125 Safari/537.36',
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 13_4) AppleWebKit/605.1.15 (KHTML, like Gecko) Version/17.0 Safari/605.1.15',
  'Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124 Safari/537.36',
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64; rv:125.0) Gecko/20100101 Firefox/125.0',
];

/** Identity used for robots.txt matching. */
export const ROBOTS_USER_AGENT = USER_AGENTS[0];

export function defaultHeaders(): Record<string, string> {
  const ua = USER_AGENTS[Math.floor(Math.random() * USER_AGENTS.length)];
  return {
    'user-agent': ua,
    accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
    'accept-language': 'en-US,en;q=0.9',
    'cache-control': 'no-cache',
    'upgrade-insecure-requests': '1',
  };
}

/**
 * Given a URL, returns its HTML or rejects with NetworkError, HttpError or
 * PolicyBlockedError.
 */
export interface PageFetcher {
  fetch(url: string): Promise<string>;
  close?(): Promise<void>;
}

export interface HttpFetcherOptions {
  robots: RobotsGuard;
  timeoutMs?: number;
  dispatcher?: Dispatcher;
}

export class HttpFetcher implements PageFetcher {
  constructor(private readonly opts: HttpFetcherOptions) {}

  async fetch(url: string): Promise<string> {
    if (!(await this.opts.robots.isAllowed(url))) throw new PolicyBlockedError(url);

    const controller = new AbortController();
    const tId = setTimeout(() => controller.abort(), this.opts.timeoutMs ?? 20000);
    try {
      const res = await undiciFetch(url, {
        method: 'GET',
        headers: defaultHeaders(),
        redirect: 'follow',
        signal: controller.signal,
        dispatcher: this.opts.dispatcher,
      }).catch((e: unknown) => {
        const reason = controller.signal.aborted ? 'Request timed out' : `Request failed: ${describeError(e)}`;
        throw new NetworkError(url, reason, { cause: e });
      });
      if (!res.ok) {
        await res.body?.cancel();
        throw new HttpError(url, res.status);
      }
      const html = await res.text().catch((e: unknown) => {
        const reason = controller.signal.aborted ? 'Request timed out' : `Reading response body failed: ${describeError(e)}`;
        throw new NetworkError(url, reason, { cause: e });
      });
      log.debug(`GET ${url} -> ${res.status} len=${html.length}`);
      return html;
    } finally {
      clearTimeout(tId);
    }
  }
}

export interface RetryOptions {
  source: string;
  limiter: RateLimiter;
  /** Total attempts, at least 1. */
  attempts: number;
  baseDelayMs: number;
  sleep?: (ms: number) => Promise<void>;
}

const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

/**
 * One rate-limiter slot per attempt. Network and HTTP failures are retried
 * with exponential backoff; anything else is rethrown at once.
 */
export async function fetchWithRetry(fetcher: PageFetcher, url: string, opts: RetryOptions): Promise<string> {
  const attempts = Math.max(1, opts.attempts);
  const pause = opts.sleep ?? sleep;
  for (let attempt = 1; ; attempt++) {
    await opts.limiter.wait(opts.source);
    try {
      return await fetcher.fetch(url);
    } catch (e) {
      if (!isRetryable(e) || attempt >= attempts) throw e;
      const delay = opts.baseDelayMs * 2 ** (attempt - 1);
      log.warn(`[${opts.source}] attempt ${attempt}/${attempts} failed for ${url}: ${e.message}; retrying in ${delay}ms`);
      await pause(delay);
    }
  }
}

/** Route every request through HTTPS_PROXY / HTTP_PROXY when set. */
export function configureHttp(proxy: string | undefined) {
  if (!proxy) return;
  setGlobalDispatcher(new ProxyAgent(proxy));
  log.debug(`Using proxy: ${proxy}`);
}
