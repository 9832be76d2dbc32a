import { describe, it, expect } from 'vitest';
import { nextPageUrl, pageKey, withPageParam } from '../src/scraper/paginator.js';

const SEARCH = 'https://dir.test/search?q=designer';

describe('nextPageUrl', () => {
  it('resolves the next link against the current page', () => {
    const html = '<nav><a class="next" href="?q=designer&page=2">Next</a></nav>';
    expect(nextPageUrl(html, 'a.next', SEARCH, 1)).toBe('https://dir.test/search?q=designer&page=2');
  });

  it('tries each selector of a list', () => {
    const html = '<nav><a class="pagination-next" href="/search/p3">Next</a></nav>';
    expect(nextPageUrl(html, ['a[aria-label="Next"]', '.pagination-next'], SEARCH, 2)).toBe('https://dir.test/search/p3');
  });

  it('returns undefined without a selector or a match', () => {
    const html = '<nav><a class="next" href="/p2">Next</a></nav>';
    expect(nextPageUrl(html, undefined, SEARCH, 1)).toBeUndefined();
    expect(nextPageUrl(html, '.missing', SEARCH, 1)).toBeUndefined();
  });

  it('stops at a disabled next control', () => {
    const html = '<a class="next" aria-disabled="true" href="/p9">Next</a>';
    expect(nextPageUrl(html, 'a.next', SEARCH, 1)).toBeUndefined();
  });

  it('sets the page parameter when the control has no link', () => {
    const html = '<button class="next" type="button">Next</button>';
    expect(nextPageUrl(html, 'button.next', 'https://dir.test/search?q=designer&page=2', 2, SEARCH)).toBe(
      'https://dir.test/search?q=designer&page=3',
    );
  });
});

describe('withPageParam', () => {
  it('replaces an existing page parameter', () => {
    expect(withPageParam('https://dir.test/s?page=1&q=x', 3)).toBe('https://dir.test/s?page=3&q=x');
  });
});

describe('pageKey', () => {
  it('ignores the fragment and a trailing slash', () => {
    expect(pageKey('https://dir.test/list/#top')).toBe('https://dir.test/list');
    expect(pageKey('https://dir.test/list')).toBe('https://dir.test/list');
  });
});
