import { beforeAll, describe, it, expect, vi } from 'vitest';
import { errors } from 'playwright-core';
import { HttpError, NetworkError } from '../src/errors.js';
import { BrowserFetcher } from '../src/scraper/browser.js';
import { setLogLevel } from '../src/utils/log.js';
import { mockSite } from './helpers.js';

beforeAll(() => setLogLevel('silent'));

function fakeBrowser(opts: { status?: number; html?: string; waitError?: Error; contentError?: Error; newPageError?: Error } = {}) {
  const page = {
    goto: vi.fn(async () => ({ status: () => opts.status ?? 200 })),
    waitForSelector: vi.fn(async () => {
      if (opts.waitError) throw opts.waitError;
      return null;
    }),
    content: vi.fn(async () => {
      if (opts.contentError) throw opts.contentError;
      return opts.html ?? '<html><body><div class="card">Alpha</div></body></html>';
    }),
    close: vi.fn(async () => {}),
  };
  const browser = {
    newPage: vi.fn(async () => {
      if (opts.newPageError) throw opts.newPageError;
      return page;
    }),
    close: vi.fn(async () => {}),
  };
  const launch = vi.fn(async () => browser);
  return { page, browser, launch };
}

describe('BrowserFetcher', () => {
  it('returns the rendered HTML after the wait selector appears', async () => {
    const { robots } = mockSite('https://spa.test');
    const { page, launch } = fakeBrowser();
    const fetcher = new BrowserFetcher({ robots, waitFor: '.card', waitTimeoutMs: 5000, launch });

    const html = await fetcher.fetch('https://spa.test/members');
    expect(html).toBe('<html><body><div class="card">Alpha</div></body></html>');
    expect(page.waitForSelector).toHaveBeenCalledWith('.card', { timeout: 5000 });
    expect(page.close).toHaveBeenCalledTimes(1);
  });

  it('launches the browser once and closes it on close()', async () => {
    const { robots } = mockSite('https://spa.test');
    const { browser, launch } = fakeBrowser();
    const fetcher = new BrowserFetcher({ robots, launch });

    await fetcher.fetch('https://spa.test/members?page=1');
    await fetcher.fetch('https://spa.test/members?page=2');
    await fetcher.close();
    expect(launch).toHaveBeenCalledTimes(1);
    expect(browser.newPage).toHaveBeenCalledTimes(2);
    expect(browser.close).toHaveBeenCalledTimes(1);
  });

  it('does not start a browser just to close it', async () => {
    const { robots } = mockSite('https://spa.test');
    const { launch } = fakeBrowser();
    await new BrowserFetcher({ robots, launch }).close();
    expect(launch).not.toHaveBeenCalled();
  });

  it('keeps the content when the wait selector times out', async () => {
    const { robots } = mockSite('https://spa.test');
    const { launch } = fakeBrowser({ html: '<html>partial</html>', waitError: new errors.TimeoutError('Timeout 5000ms exceeded') });
    const fetcher = new BrowserFetcher({ robots, waitFor: '.card', launch });
    expect(await fetcher.fetch('https://spa.test/members')).toBe('<html>partial</html>');
  });

  it('propagates other wait failures and still closes the page', async () => {
    const { robots } = mockSite('https://spa.test');
    const { page, launch } = fakeBrowser({ waitError: new Error('Target closed') });
    const fetcher = new BrowserFetcher({ robots, waitFor: '.card', launch });
    await expect(fetcher.fetch('https://spa.test/members')).rejects.toThrow('Target closed');
    expect(page.close).toHaveBeenCalledTimes(1);
  });

  it('reports a page that cannot be opened as a NetworkError and relaunches next time', async () => {
    const { robots } = mockSite('https://spa.test');
    const { browser, launch } = fakeBrowser({ newPageError: new Error('Target page, context or browser has been closed') });
    const fetcher = new BrowserFetcher({ robots, launch });

    const err = await fetcher.fetch('https://spa.test/members').catch((e: unknown) => e);
    expect(err).toBeInstanceOf(NetworkError);
    expect(browser.close).toHaveBeenCalledTimes(1);
    await expect(fetcher.fetch('https://spa.test/members')).rejects.toBeInstanceOf(NetworkError);
    expect(launch).toHaveBeenCalledTimes(2);
  });

  it('reports a failed content read as a NetworkError and still closes the page', async () => {
    const { robots } = mockSite('https://spa.test');
    const { page, launch } = fakeBrowser({ contentError: new Error('Target page, context or browser has been closed') });
    const fetcher = new BrowserFetcher({ robots, launch });
    await expect(fetcher.fetch('https://spa.test/members')).rejects.toBeInstanceOf(NetworkError);
    expect(page.close).toHaveBeenCalledTimes(1);
  });

  it('rejects a non-2xx navigation with HttpError', async () => {
    const { robots } = mockSite('https://spa.test');
    const { launch } = fakeBrowser({ status: 503 });
    const fetcher = new BrowserFetcher({ robots, launch });
    await expect(fetcher.fetch('https://spa.test/members')).rejects.toBeInstanceOf(HttpError);
  });

  it('reports a failed launch as a NetworkError', async () => {
    const { robots } = mockSite('https://spa.test');
    const launch = vi.fn(async () => {
      throw new Error('Executable does not exist');
    });
    const fetcher = new BrowserFetcher({ robots, launch });
    await expect(fetcher.fetch('https://spa.test/members')).rejects.toBeInstanceOf(NetworkError);
    await fetcher.close();
  });
});
