import * as cheerio from 'cheerio';
import { selectorList, type Selector } from '../config.js';
import { ExtractionError } from '../errors.js';
import { createLogger } from '../utils/log.js';

const log = createLogger('paginate');

/**
 * URL of the page after `currentUrl`, or undefined when the next-page
 * selector matches nothing. A match without a usable href (a button) falls
 * back to `page=<pageNumber + 1>` on `searchUrl`.
 */
export function nextPageUrl(
  html: string,
  selector: Selector | undefined,
  currentUrl: string,
  pageNumber: number,
  searchUrl: string = currentUrl,
): string | undefined {
  const sels = selectorList(selector);
  if (!sels.length) return undefined;
  const $ = cheerio.load(html);
  for (const sel of sels) {
    const match = firstMatch($, sel);
    if (!match?.length) continue;
    if (match.is('[disabled], [aria-disabled="true"]')) return undefined;
    const href = (match.attr('href') ?? match.find('a[href]').first().attr('href'))?.trim();
    if (href && !href.startsWith('#') && !/^javascript:/i.test(href)) {
      try {
        return new URL(href, currentUrl).toString();
      } catch {
        log.debug(`Unusable next-page href ${href} on ${currentUrl}`);
      }
    }
    return withPageParam(searchUrl, pageNumber + 1);
  }
  return undefined;
}

function firstMatch($: cheerio.CheerioAPI, sel: string) {
  try {
    return $(sel).first();
  } catch (e) {
    log.debug(new ExtractionError('next_page', sel, { cause: e }).message);
    return null;
  }
}

export function withPageParam(url: string, page: number): string {
  const u = new URL(url);
  u.searchParams.set('page', String(page));
  return u.toString();
}

/** Visited-set key: fragment dropped, trailing slash ignored. */
export function pageKey(url: string): string {
  try {
    const u = new URL(url);
    u.hash = '';
    const s = u.toString();
    return s.endsWith('/') ? s.slice(0, -1) : s;
  } catch {
    return url;
  }
}
