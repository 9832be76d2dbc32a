import { describe, it, expect } from 'vitest';
import { RateLimiter } from '../src/scraper/rate-limiter.js';

function fakeClock(start = 1000) {
  const clock = { t: start, sleeps: [] as number[] };
  const sleep = async (ms: number) => {
    clock.sleeps.push(ms);
    clock.t += ms;
  };
  return { clock, now: () => clock.t, sleep };
}

describe('RateLimiter', () => {
  it('never waits on the first request of a source', async () => {
    const { clock, now, sleep } = fakeClock();
    const limiter = new RateLimiter({ defaultDelay: 2, now, sleep });
    await limiter.wait('houzz');
    await limiter.wait('yelp');
    expect(clock.sleeps).toEqual([]);
  });

  it('sleeps only the part of the delay that has not elapsed', async () => {
    const { clock, now, sleep } = fakeClock();
    const limiter = new RateLimiter({ defaultDelay: 2, now, sleep });
    await limiter.wait('houzz');
    clock.t += 500;
    await limiter.wait('houzz');
    expect(clock.sleeps).toEqual([1500]);
    clock.t += 5000;
    await limiter.wait('houzz');
    expect(clock.sleeps).toEqual([1500]);
  });

  it('keeps a separate clock per source', async () => {
    const { clock, now, sleep } = fakeClock();
    const limiter = new RateLimiter({ defaultDelay: 1, now, sleep });
    await limiter.wait('a');
    await limiter.wait('b');
    await limiter.wait('a');
    expect(clock.sleeps).toEqual([1000]);
  });

  it('adds configured jitter to the delay', async () => {
    const { clock, now, sleep } = fakeClock();
    const limiter = new RateLimiter({ now, sleep, random: () => 0.5 });
    limiter.configure('asid', 1, 2);
    await limiter.wait('asid');
    await limiter.wait('asid');
    expect(clock.sleeps).toEqual([2000]);
  });

  it('uses per-source delays over the default', () => {
    const limiter = new RateLimiter({ defaultDelay: 1 });
    limiter.configure('yelp', 2, 0.5);
    limiter.configure('houzz', 1.5);
    expect(limiter.delayFor('yelp')).toBe(2);
    expect(limiter.delayFor('houzz')).toBe(1.5);
    expect(limiter.delayFor('other')).toBe(1);
  });

  it('does not sleep when the delay is zero', async () => {
    const { clock, now, sleep } = fakeClock();
    const limiter = new RateLimiter({ defaultDelay: 0, now, sleep });
    await limiter.wait('a');
    await limiter.wait('a');
    expect(clock.sleeps).toEqual([]);
  });
});
