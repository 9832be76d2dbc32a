export class ScraperError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Timeout or connection failure. Retried. */
export class NetworkError extends ScraperError {
  constructor(readonly url: string, message: string, options?: { cause?: unknown }) {
    super(`${message} (${url})`, options);
  }
}

/** Non-2xx response. Retried like a network failure. */
export class HttpError extends ScraperError {
  constructor(readonly url: string, readonly status: number) {
    super(`GET ${url} -> ${status}`);
  }
}

/** robots.txt disallows the URL. Never retried. */
export class PolicyBlockedError extends ScraperError {
  constructor(readonly url: string) {
    super(`Blocked by robots.txt: ${url}`);
  }
}

export class ExtractionError extends ScraperError {
  constructor(readonly field: string, readonly selector: string, options?: { cause?: unknown }) {
    super(`Selector for ${field} failed: ${selector}`, options);
  }
}

/** A CSV file could not be read or written. Fatal for the run. */
export class IOError extends ScraperError {
  constructor(readonly path: string, options?: { cause?: unknown; reading?: boolean }) {
    super(`Cannot ${options?.reading ? 'read' : 'write'} ${path}: ${describeError(options?.cause)}`, { cause: options?.cause });
  }
}

export class ConfigError extends ScraperError {}

export function describeError(e: unknown): string {
  if (e instanceof Error) return e.message;
  return String(e);
}

export function isRetryable(e: unknown): e is NetworkError | HttpError {
  return e instanceof NetworkError || e instanceof HttpError;
}
