export interface RateLimiterOptions {
  /** Seconds between two requests of the same source when none is configured. */
  defaultDelay?: number;
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
}

const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

/**
 * Minimum spacing between requests, one clock per source. The first call for
 * a source never waits.
 */
export class RateLimiter {
  private readonly last = new Map<string, number>();
  private readonly delays = new Map<string, number>();
  private readonly jitter = new Map<string, number>();
  private readonly defaultDelay: number;
  private readonly now: () => number;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly random: () => number;

  constructor(opts: RateLimiterOptions = {}) {
    this.defaultDelay = opts.defaultDelay ?? 1.0;
    this.now = opts.now ?? Date.now;
    this.sleep = opts.sleep ?? sleep;
    this.random = opts.random ?? Math.random;
  }

  /** Per-source delay, and the upper bound of a random extra delay, in seconds. */
  configure(source: string, delaySeconds: number, jitterSeconds = 0) {
    this.delays.set(source, delaySeconds);
    this.jitter.set(source, jitterSeconds);
  }

  delayFor(source: string): number {
    return this.delays.get(source) ?? this.defaultDelay;
  }

  async wait(source: string): Promise<void> {
    const previous = this.last.get(source);
    if (previous !== undefined) {
      const extra = (this.jitter.get(source) ?? 0) * this.random();
      const required = (this.delayFor(source) + extra) * 1000;
      const remaining = previous + required - this.now();
      if (remaining > 0) await this.sleep(remaining);
    }
    this.last.set(source, this.now());
  }
}
