import { afterEach, describe, it, expect, vi } from 'vitest';
import { createLogger, getLogLevel, setLogLevel } from '../src/utils/log.js';

afterEach(() => {
  vi.restoreAllMocks();
  setLogLevel('info');
});

describe('logger', () => {
  it('prefixes lines with level and scope and filters by level', () => {
    const out = vi.spyOn(console, 'log').mockImplementation(() => {});
    const err = vi.spyOn(console, 'error').mockImplementation(() => {});
    setLogLevel('info');
    const log = createLogger('scrape');
    log.debug('hidden');
    log.info('page 1');
    log.warn('slow response');
    expect(out.mock.calls).toEqual([['INFO  [scrape] page 1']]);
    expect(err.mock.calls).toEqual([['WARN  [scrape] slow response']]);
  });

  it('accepts level names in any case', () => {
    setLogLevel('WARNING');
    expect(getLogLevel()).toBe('warn');
    setLogLevel('Debug');
    expect(getLogLevel()).toBe('debug');
  });

  it('rejects unknown levels', () => {
    expect(() => setLogLevel('verbose')).toThrow('Unknown log level: verbose');
  });
});
