/**
 * One contact collected from a directory listing. Column order of the CSV
 * export follows {@link CONTACT_COLUMNS}.
 */
export interface ContactRecord {
  readonly name: string;
  readonly email?: string;
  readonly phone?: string;
  readonly website?: string;
  readonly address?: string;
  readonly city?: string;
  readonly state?: string;
  readonly zip_code?: string;
  readonly social_media?: string;
  readonly specialty?: string;
  readonly source_url?: string;
}

export const CONTACT_COLUMNS = [
  'name',
  'email',
  'phone',
  'website',
  'address',
  'city',
  'state',
  'zip_code',
  'social_media',
  'specialty',
  'source_url',
] as const satisfies readonly (keyof ContactRecord)[];


/** A record plus the page to visit for fields the listing does not show. */
export interface Listing {
  record: ContactRecord;
  detailUrl?: string;
}

export interface ScrapeStats {
  sources: number;
  pages: number;
  records: number;
  exported: number;
}
