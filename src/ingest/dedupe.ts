import type { ContactRecord } from '../types.js';

export function normalizeText(s: string | undefined) {
  return (s ?? '').toLowerCase().replace(/\s+/g, ' ').trim();
}

/** Digits only, compared by the local ten so a +1 prefix does not matter. */
export function normalizePhoneKey(s: string | undefined) {
  return (s ?? '').replace(/\D/g, '').slice(-10);
}

export function normalizeWebsite(u: string | undefined) {
  const s = (u ?? '').trim().toLowerCase();
  if (!s) return '';
  try {
    const url = new URL(s.includes('://') ? s : `https://${s}`);
    const host = url.hostname.replace(/^www\./, '');
    const pathname = url.pathname.replace(/\/+$/, '');
    return `${host}${pathname}`;
  } catch {
    return s
      .replace(/^https?:\/\//, '')
      .replace(/^www\./, '')
      .replace(/[?#].*$/, '')
      .replace(/\/+$/, '');
  }
}

/**
 * Keeps the first occurrence of every contact. Two records are the same
 * contact when their names match and they share a phone or a website; when
 * neither has a phone or a website, name and city decide.
 */
export function dedupe<T extends ContactRecord>(records: readonly T[]): T[] {
  return dedupeBy(records, (r) => r);
}

/** {@link dedupe} over items that are not records themselves, such as raw CSV rows. */
export function dedupeBy<T>(items: readonly T[], toRecord: (item: T) => ContactRecord): T[] {
  const byPhone = new Set<string>();
  const byWebsite = new Set<string>();
  const byCity = new Set<string>();
  const unique: T[] = [];

  for (const item of items) {
    const r = toRecord(item);
    const name = normalizeText(r.name);
    const phone = normalizePhoneKey(r.phone);
    const website = normalizeWebsite(r.website);
    const phoneKey = phone && `${name}\u0000${phone}`;
    const websiteKey = website && `${name}\u0000${website}`;
    const cityKey = !phone && !website ? `${name}\u0000${normalizeText(r.city)}` : '';

    if ((phoneKey && byPhone.has(phoneKey)) || (websiteKey && byWebsite.has(websiteKey)) || (cityKey && byCity.has(cityKey))) {
      continue;
    }
    if (phoneKey) byPhone.add(phoneKey);
    if (websiteKey) byWebsite.add(websiteKey);
    if (cityKey) byCity.add(cityKey);
    unique.push(item);
  }
  return unique;
}
