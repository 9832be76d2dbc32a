import { beforeAll, describe, it, expect, vi } from 'vitest';
import { MockAgent } from 'undici';
import { HttpError, NetworkError, PolicyBlockedError } from '../src/errors.js';
import { HttpFetcher, fetchWithRetry, type PageFetcher } from '../src/scraper/fetcher.js';
import { RateLimiter } from '../src/scraper/rate-limiter.js';
import { RobotsGuard } from '../src/scraper/robots.js';
import { setLogLevel } from '../src/utils/log.js';
import { mockSite } from './helpers.js';

beforeAll(() => setLogLevel('silent'));

describe('HttpFetcher', () => {
  it('returns the body of a 200 response', async () => {
    const { agent, pool, robots } = mockSite('https://dir.test');
    pool.intercept({ path: '/search?q=designer' }).reply(200, '<html><body>results</body></html>');
    const fetcher = new HttpFetcher({ robots, dispatcher: agent });
    expect(await fetcher.fetch('https://dir.test/search?q=designer')).toBe('<html><body>results</body></html>');
  });

  it('rejects a non-2xx response with HttpError', async () => {
    const { agent, pool, robots } = mockSite('https://dir.test');
    pool.intercept({ path: '/gone' }).reply(404, 'missing');
    const fetcher = new HttpFetcher({ robots, dispatcher: agent });
    const err = await fetcher.fetch('https://dir.test/gone').catch((e: unknown) => e);
    expect(err).toBeInstanceOf(HttpError);
    expect(err).toMatchObject({ status: 404, url: 'https://dir.test/gone' });
  });

  it('rejects a connection failure with NetworkError', async () => {
    const { agent, pool, robots } = mockSite('https://dir.test');
    pool.intercept({ path: '/flaky' }).replyWithError(new Error('socket hang up'));
    const fetcher = new HttpFetcher({ robots, dispatcher: agent });
    await expect(fetcher.fetch('https://dir.test/flaky')).rejects.toBeInstanceOf(NetworkError);
  });

  it('refuses pages robots.txt disallows without requesting them', async () => {
    const agent = new MockAgent();
    agent.disableNetConnect();
    agent.get('https://dir.test').intercept({ path: '/robots.txt' }).reply(200, 'User-agent: *\nDisallow: /private\n');
    const robots = new RobotsGuard({ userAgent: 'test-agent', dispatcher: agent });
    const fetcher = new HttpFetcher({ robots, dispatcher: agent });
    await expect(fetcher.fetch('https://dir.test/private/list')).rejects.toBeInstanceOf(PolicyBlockedError);
  });
});

describe('fetchWithRetry', () => {
  const sleeps: number[] = [];
  const options = (limiter: RateLimiter, attempts = 3) => ({
    source: 'houzz',
    limiter,
    attempts,
    baseDelayMs: 100,
    sleep: async (ms: number) => {
      sleeps.push(ms);
    },
  });

  function failing(times: number, error: (url: string) => Error): PageFetcher & { calls: number } {
    const fetcher: PageFetcher & { calls: number } = {
      calls: 0,
      async fetch(url: string) {
        fetcher.calls++;
        if (fetcher.calls <= times) throw error(url);
        return '<html>ok</html>';
      },
    };
    return fetcher;
  }

  it('retries HTTP failures with exponential backoff', async () => {
    sleeps.length = 0;
    const limiter = new RateLimiter({ defaultDelay: 0 });
    const wait = vi.spyOn(limiter, 'wait');
    const fetcher = failing(2, (url) => new HttpError(url, 503));

    const html = await fetchWithRetry(fetcher, 'https://dir.test/', options(limiter));
    expect(html).toBe('<html>ok</html>');
    expect(fetcher.calls).toBe(3);
    expect(sleeps).toEqual([100, 200]);
    expect(wait).toHaveBeenCalledTimes(3);
  });

  it('gives up after the configured number of attempts', async () => {
    sleeps.length = 0;
    const fetcher = failing(5, (url) => new NetworkError(url, 'Request timed out'));
    await expect(fetchWithRetry(fetcher, 'https://dir.test/', options(new RateLimiter({ defaultDelay: 0 }), 2))).rejects.toBeInstanceOf(
      NetworkError,
    );
    expect(fetcher.calls).toBe(2);
    expect(sleeps).toEqual([100]);
  });

  it('does not retry a robots.txt refusal', async () => {
    sleeps.length = 0;
    const fetcher = failing(1, (url) => new PolicyBlockedError(url));
    await expect(fetchWithRetry(fetcher, 'https://dir.test/', options(new RateLimiter({ defaultDelay: 0 })))).rejects.toBeInstanceOf(
      PolicyBlockedError,
    );
    expect(fetcher.calls).toBe(1);
    expect(sleeps).toEqual([]);
  });
});
