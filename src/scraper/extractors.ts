import * as cheerio from 'cheerio';
import type { Cheerio, CheerioAPI } from 'cheerio';
import type { AnyNode } from 'domhandler';
import { parsePhoneNumberFromString } from 'libphonenumber-js/max';
import { selectorList, type Selector, type SelectorMap } from '../config.js';
import { ExtractionError } from '../errors.js';
import type { ContactRecord, Listing } from '../types.js';
import { createLogger } from '../utils/log.js';

const log = createLogger('extract');

const SOCIAL_PATTERNS = {
  facebook: [/facebook\.com\//i, /m\.facebook\.com\//i, /l\.facebook\.com\//i],
  instagram: [/instagram\.com\//i],
  linkedin: [/linkedin\.com\//i],
  twitter: [/x\.com\//i, /twitter\.com\//i],
  pinterest: [/pinterest\.[a-z.]+\//i, /pin\.it\//i],
  youtube: [/youtube\.com\//i, /youtu\.be\//i],
};

const HEADINGS = 'h1, h2, h3, h4, h5, h6';

// Placeholder texts directories render where a result would be.
const INVALID_NAMES = [/^no (matches|results)\b/i, /\btry again\b/i, /^loading\b/i, /^search results?$/i, /^filters?\b/i, /^error\b/i];

const EMAIL_RE = /^[a-z0-9._%+-]+@[a-z0-9.-]+\.[a-z]{2,}$/;
const EMAIL_IN_TEXT = /[A-Za-z][A-Za-z0-9._%+-]*@[A-Za-z0-9.-]+\.[A-Za-z]{2,}/g;
const EMAIL_FROM_LETTER = /[A-Za-z][A-Za-z0-9._%+-]*@[A-Za-z0-9.-]+\.[A-Za-z]{2,}/;
const PHONE_OR_ZIP = /^[\d\s().+-]+$/;
const IGNORED_EMAILS = ['example.com', 'noreply', 'no-reply'];

type Block = Cheerio<AnyNode>;

export interface ExtractOptions {
  /** Treat numbered headings ("1. Studio Name") as listings, for curated list pages. */
  curatedList?: boolean;
  /** Directory host; links to it are never taken as a contact's website. */
  baseUrl?: string;
}

/** Records found on one page. Listings without a usable name are dropped. */
export function extract(html: string, selectors: SelectorMap, pageUrl: string, opts: ExtractOptions = {}): ContactRecord[] {
  return extractListings(html, selectors, pageUrl, opts).map((l) => l.record);
}

export function extractListings(
  html: string,
  selectors: SelectorMap,
  pageUrl: string,
  opts: ExtractOptions = {},
): Listing[] {
  const $ = cheerio.load(html);
  const blocks = findBlocks($, selectors, opts.curatedList ?? false);
  const listings: Listing[] = [];
  for (const block of blocks) {
    const listing = parseListing(block, selectors, pageUrl, opts.baseUrl);
    if (listing) listings.push(listing);
  }
  log.debug(`${pageUrl}: ${blocks.length} blocks, ${listings.length} records`);
  return listings;
}

function findBlocks($: CheerioAPI, selectors: SelectorMap, curatedList: boolean): Block[] {
  if (curatedList) {
    const numbered = $(HEADINGS).filter((_, el) => {
      const text = $(el).text().trim();
      return /^\d+\./.test(text) || /\d+\.\s+[A-Z]/.test(text);
    });
    if (numbered.length) {
      return numbered.toArray().map((el) => {
        const heading = $(el);
        const wrapper = $('<div></div>');
        wrapper.append(heading.clone());
        wrapper.append(heading.nextUntil(HEADINGS).slice(0, 10).clone());
        return wrapper;
      });
    }
  }
  for (const sel of selectorList(selectors.listing)) {
    try {
      const found = $(sel);
      if (found.length) return found.toArray().map((el) => $(el));
    } catch (e) {
      log.debug(new ExtractionError('listing', sel, { cause: e }).message);
    }
  }
  return [];
}

function parseListing(block: Block, selectors: SelectorMap, pageUrl: string, baseUrl: string | undefined): Listing | null {
  const name = cleanName(firstValue(block, selectors.name, 'name', readText));
  if (!name) return null;

  const readHref = (el: Block) => toAbsoluteUrl(linkOf(el), pageUrl);
  const website = firstValue(block, selectors.website, 'website', readHref) ?? findExternalWebsite(block, pageUrl, baseUrl);

  const cell = splitContactCell(firstValue(block, selectors.email, 'email', readEmailCell));
  const record: ContactRecord = {
    name,
    email: cell.email,
    phone: normalizePhone(firstValue(block, selectors.phone, 'phone', readPhone) ?? cell.phone),
    website,
    address: firstValue(block, selectors.address, 'address', readText),
    city: firstValue(block, selectors.city, 'city', readText),
    state: firstValue(block, selectors.state, 'state', readText),
    zip_code: firstValue(block, selectors.zip_code, 'zip_code', readText) ?? cell.zip_code,
    social_media: socialLinks(block, pageUrl),
    specialty: firstValue(block, selectors.specialty, 'specialty', readText),
    source_url: pageUrl,
  };
  const detailUrl = firstValue(block, selectors.detail_link, 'detail_link', readHref);
  return detailUrl ? { record, detailUrl } : { record };
}

/**
 * First non-empty value over the selector list. A selector that throws leaves
 * the field empty instead of failing the listing.
 */
function firstValue(block: Block, selector: Selector | undefined, field: string, read: (el: Block) => string | undefined): string | undefined {
  for (const sel of selectorList(selector)) {
    try {
      const inner = block.find(sel).first();
      const el = inner.length ? inner : block.is(sel) ? block : null;
      if (!el) continue;
      const value = read(el);
      if (value) return value;
    } catch (e) {
      log.debug(new ExtractionError(field, sel, { cause: e }).message);
    }
  }
  return undefined;
}

function readText(el: Block): string | undefined {
  const text = el.text().replace(/\s+/g, ' ').trim();
  return text || undefined;
}

function linkOf(el: Block): string | undefined {
  const href = el.attr('href') ?? el.find('a[href]').first().attr('href');
  if (!href || href.startsWith('#') || /^javascript:/i.test(href)) return undefined;
  return href.trim();
}

function readEmailCell(el: Block): string | undefined {
  const href = el.attr('href');
  const raw = href && /^mailto:/i.test(href) ? href : (el.attr('data-email') ?? readText(el));
  return splitContactCell(raw).email ? raw : undefined;
}

function readPhone(el: Block): string | undefined {
  const href = el.attr('href');
  return readText(el) ?? el.attr('data-phone') ?? (href && /^tel:/i.test(href) ? href : undefined);
}

function findExternalWebsite(block: Block, pageUrl: string, baseUrl: string | undefined): string | undefined {
  const ownHosts = new Set([hostOf(pageUrl), baseUrl ? hostOf(baseUrl) : undefined].filter(Boolean));
  const preferred: string[] = [];
  const others: string[] = [];
  const links = block.find('a[href]');
  links.each((i) => {
    const link = links.eq(i);
    const href = String(link.attr('href') ?? '').trim();
    if (!/^https?:\/\//i.test(href)) return;
    if (isSocial(href) || ownHosts.has(hostOf(href))) return;
    if (/website|visit|www/i.test(link.text())) preferred.push(href);
    else others.push(href);
  });
  return preferred[0] ?? others[0];
}

function socialLinks(block: Block, pageUrl: string): string | undefined {
  const found = new Map<string, string>();
  const links = block.find('a[href]');
  links.each((i) => {
    const href = String(links.eq(i).attr('href') ?? '').trim();
    if (!href) return;
    const abs = canonicalizeUrl(toAbsoluteUrl(href, pageUrl) ?? href);
    for (const [network, patterns] of Object.entries(SOCIAL_PATTERNS)) {
      if (!found.has(network) && patterns.some((r) => r.test(abs))) found.set(network, abs);
    }
  });
  if (!found.size) return undefined;
  return Array.from(found, ([network, url]) => `${network}: ${url}`).join(', ');
}

function isSocial(u: string) {
  return Object.values(SOCIAL_PATTERNS).some((patterns) => patterns.some((r) => r.test(u)));
}

/**
 * Strips list numbering and collapses whitespace. Returns undefined for names
 * too short to be real or for directory placeholder texts.
 */
export function cleanName(raw: string | undefined): string | undefined {
  if (!raw) return undefined;
  const name = raw
    .replace(/^\s*\d+(?:\.\s*|\s+)/, '')
    .replace(/\s+/g, ' ')
    .trim();
  if (name.length < 3) return undefined;
  if (INVALID_NAMES.some((r) => r.test(name))) return undefined;
  return name;
}

export function normalizeEmail(raw: string | undefined): string | undefined {
  if (!raw) return undefined;
  const email = raw.replace(/^mailto:/i, '').split('?')[0].trim().toLowerCase();
  return EMAIL_RE.test(email) ? email : undefined;
}

export interface ContactCell {
  email?: string;
  phone?: string;
  zip_code?: string;
}

/**
 * Splits an email cell that a phone number or zip code runs into, as in
 * `212.477.0287info@studio.test` or `10038info@studio.test`. Any other cell
 * is read as a plain email.
 */
export function splitContactCell(raw: string | undefined): ContactCell {
  const text = raw?.replace(/^mailto:/i, '').trim();
  if (!text) return {};
  const match = EMAIL_FROM_LETTER.exec(text);
  const prefix = match ? text.slice(0, match.index).trim() : '';
  const digits = prefix.replace(/\D/g, '').length;
  if (match && PHONE_OR_ZIP.test(prefix) && (digits === 5 || digits >= 7)) {
    const email = normalizeEmail(match[0]);
    return digits === 5 ? { email, zip_code: prefix } : { email, phone: prefix };
  }
  const email = normalizeEmail(text);
  return email ? { email } : {};
}

/**
 * US numbers come out as `(415) 555-0101`, other countries in international
 * format. Text that is not a possible number is kept as found.
 */
export function normalizePhone(raw: string | undefined): string | undefined {
  if (!raw) return undefined;
  const cleaned = raw.replace(/^tel:/i, '').replace(/\s+/g, ' ').trim();
  if (!cleaned) return undefined;
  const parsed = parsePhoneNumberFromString(cleaned, 'US');
  if (parsed && parsed.isPossible()) {
    return parsed.countryCallingCode === '1' ? parsed.formatNational() : parsed.formatInternational();
  }
  return cleaned;
}

/** First contact email on a detail page: mailto links first, then page text. */
export function findEmail(html: string): string | undefined {
  const $ = cheerio.load(html);
  const candidates: string[] = [];
  $('a[href^="mailto:"]').each((_, el) => {
    const email = normalizeEmail($(el).attr('href'));
    if (email) candidates.push(email);
  });
  const text = $('body').text() || $.root().text();
  for (const match of text.match(EMAIL_IN_TEXT) ?? []) {
    const email = normalizeEmail(match);
    if (email) candidates.push(email);
  }
  return candidates.find((e) => !IGNORED_EMAILS.some((x) => e.includes(x)));
}

export function toAbsoluteUrl(href: string | undefined, base: string): string | undefined {
  if (!href) return undefined;
  try {
    return new URL(href, base).toString();
  } catch {
    return href;
  }
}

function hostOf(u: string): string | undefined {
  try {
    return new URL(u).hostname.toLowerCase().replace(/^www\./, '');
  } catch {
    return undefined;
  }
}

export function canonicalizeUrl(u: string) {
  try {
    // Unwrap facebook outbound links
    if (/l\.facebook\.com\//i.test(u) && /[?&]u=/.test(u)) {
      const url = new URL(u);
      const wrapped = url.searchParams.get('u');
      if (wrapped) u = decodeURIComponent(wrapped);
    }
    const url = new URL(u);
    url.hash = '';
    // strip tracking params
    ['utm_source', 'utm_medium', 'utm_campaign', 'utm_term', 'utm_content', 'fbclid', 'gclid', 'mc_cid', 'mc_eid'].forEach((p) =>
      url.searchParams.delete(p),
    );
    return url.toString();
  } catch {
    return u.split('?')[0];
  }
}
