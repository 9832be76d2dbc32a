import { chromium, errors } from 'playwright-core';
import { HttpError, NetworkError, PolicyBlockedError, describeError } from '../errors.js';
import { createLogger } from '../utils/log.js';
import { USER_AGENTS, type PageFetcher } from './fetcher.js';
import type { RobotsGuard } from './robots.js';

const log = createLogger('browser');

export interface PageLike {
  goto(url: string, options?: { timeout?: number; waitUntil?: 'domcontentloaded' }): Promise<{ status(): number } | null>;
  waitForSelector(selector: string, options?: { timeout?: number }): Promise<unknown>;
  content(): Promise<string>;
  close(): Promise<void>;
}

export interface BrowserLike {
  newPage(options?: { userAgent?: string }): Promise<PageLike>;
  close(): Promise<void>;
}

export interface BrowserFetcherOptions {
  robots: RobotsGuard;
  /** CSS selector whose presence marks the page as rendered. */
  waitFor?: string;
  waitTimeoutMs?: number;
  navigationTimeoutMs?: number;
  launch: () => Promise<BrowserLike>;
}

export interface LaunchOptions {
  executablePath?: string;
  wsEndpoint?: string;
}

/** Connect to a running browser when an endpoint is given, otherwise start a local chromium. */
export function launchChromium(opts: LaunchOptions): () => Promise<BrowserLike> {
  return async () => {
    if (opts.wsEndpoint) return chromium.connect(opts.wsEndpoint);
    return chromium.launch({
      headless: true,
      executablePath: opts.executablePath,
      args: ['--disable-blink-features=AutomationControlled', '--disable-dev-shm-usage', '--no-sandbox'],
    });
  };
}

/**
 * Renders script-driven pages. The browser starts on the first fetch and
 * lives until close(); each fetch opens and closes its own page.
 */
export class BrowserFetcher implements PageFetcher {
  private browser: Promise<BrowserLike> | null = null;

  constructor(private readonly opts: BrowserFetcherOptions) {}

  async fetch(url: string): Promise<string> {
    if (!(await this.opts.robots.isAllowed(url))) throw new PolicyBlockedError(url);

    if (!this.browser) this.browser = this.opts.launch();
    let browser: BrowserLike;
    try {
      browser = await this.browser;
    } catch (e) {
      this.browser = null;
      throw new NetworkError(url, `Browser unavailable: ${describeError(e)}`, { cause: e });
    }

    let page: PageLike;
    try {
      page = await browser.newPage({ userAgent: USER_AGENTS[0] });
    } catch (e) {
      // the browser went away; the next attempt starts a new one
      this.browser = null;
      await browser.close().catch((closeErr: unknown) => log.debug(`Closing dead browser: ${describeError(closeErr)}`));
      throw new NetworkError(url, `Browser page failed: ${describeError(e)}`, { cause: e });
    }
    try {
      const res = await page
        .goto(url, { waitUntil: 'domcontentloaded', timeout: this.opts.navigationTimeoutMs ?? 30000 })
        .catch((e: unknown) => {
          throw new NetworkError(url, `Navigation failed: ${describeError(e)}`, { cause: e });
        });
      if (res && (res.status() < 200 || res.status() >= 300)) throw new HttpError(url, res.status());

      if (this.opts.waitFor) {
        try {
          await page.waitForSelector(this.opts.waitFor, { timeout: this.opts.waitTimeoutMs ?? 15000 });
        } catch (e) {
          if (!(e instanceof errors.TimeoutError)) throw e;
          // rendered content may still be usable
          log.warn(`Timeout waiting for ${this.opts.waitFor} on ${url}`);
        }
      }
      return await page.content().catch((e: unknown) => {
        throw new NetworkError(url, `Reading page content failed: ${describeError(e)}`, { cause: e });
      });
    } finally {
      await page.close().catch((e: unknown) => log.debug(`Closing page for ${url}: ${describeError(e)}`));
    }
  }

  async close(): Promise<void> {
    const pending = this.browser;
    this.browser = null;
    if (!pending) return;
    // a failed launch was already reported by fetch()
    const browser = await pending.catch(() => null);
    if (browser) await browser.close();
  }
}
