import fs from 'node:fs';
import path from 'node:path';
import { IOError, describeError } from '../errors.js';
import { CONTACT_COLUMNS, type ContactRecord } from '../types.js';
import { readCsvTable, rowToRecord, writeCsv } from '../utils/csv.js';
import { createLogger } from '../utils/log.js';
import { splitContactCell } from '../scraper/extractors.js';
import { dedupe, dedupeBy } from './dedupe.js';

const log = createLogger('merge');

export type MergedRecord = ContactRecord & { source: string };

export const MERGED_COLUMNS = [...CONTACT_COLUMNS, 'source'] as const;

export interface MergeSummary {
  files: string[];
  rows: number;
  written: number;
}

/** `houzz_designers_page2.csv` -> `houzz`, `asid_results.csv` -> `asid`. */
export function sourceLabel(file: string): string {
  return path
    .basename(file, path.extname(file))
    .replace(/_page\d+$/i, '')
    .replace(/_(results|designers)$/i, '');
}

/**
 * Combines every CSV in `dir` into `masterPath`, tagging each row with the
 * source its file was written by. The master file itself is never read back.
 */
export async function mergeCsvDirectory(
  dir: string,
  masterPath: string,
  opts: { dedupe?: boolean } = {},
): Promise<MergeSummary> {
  const master = path.resolve(masterPath);
  const entries = await fs.promises.readdir(dir).catch((e: unknown) => {
    throw new IOError(dir, { cause: e, reading: true });
  });
  const files = entries
    .filter((f) => f.toLowerCase().endsWith('.csv'))
    .map((f) => path.join(dir, f))
    .filter((f) => path.resolve(f) !== master)
    .sort();

  const all: MergedRecord[] = [];
  const read: string[] = [];
  for (const file of files) {
    try {
      const { rows } = await readCsvTable(file);
      const source = sourceLabel(file);
      let count = 0;
      for (const row of rows) {
        const record = rowToRecord(row);
        if (!record) continue;
        all.push({ ...record, source });
        count++;
      }
      read.push(file);
      log.info(`${file}: ${count} records`);
    } catch (e) {
      log.warn(`Skipping ${file}: ${describeError(e)}`);
    }
  }

  if (!all.length) {
    log.warn(`No records found in ${dir}`);
    return { files: read, rows: 0, written: 0 };
  }
  const merged = opts.dedupe === false ? all : dedupe(all);
  if (merged.length < all.length) log.info(`Removed ${all.length - merged.length} duplicate records`);
  const written = await writeCsv(masterPath, MERGED_COLUMNS, merged, 'overwrite');
  log.info(`Merged ${written} records from ${read.length} file(s) -> ${masterPath}`);
  return { files: read, rows: all.length, written };
}

/**
 * Moves a phone number or zip code that ran into the email cell to its own
 * column, when that column exists and is empty. Returns whether the row changed.
 */
function repairEmailCell(row: Record<string, string>, columns: readonly string[]): boolean {
  const raw = row.email?.trim();
  if (!raw) return false;
  const cell = splitContactCell(raw);
  if (!cell.phone && !cell.zip_code) return false;
  row.email = cell.email ?? '';
  for (const field of ['phone', 'zip_code'] as const) {
    const value = cell[field];
    if (value && columns.includes(field) && !row[field]?.trim()) row[field] = value;
  }
  return true;
}

/**
 * Rewrites a CSV without its duplicate contacts, keeping its own header order.
 * Email cells with a phone number or zip code run into them are split first.
 */
export async function dedupeCsvFile(filePath: string): Promise<{ before: number; after: number; repaired: number }> {
  const { columns, rows } = await readCsvTable(filePath);
  const repaired = rows.filter((row) => repairEmailCell(row, columns)).length;
  const unique = dedupeBy(rows, (row) => ({
    name: row.name ?? '',
    phone: row.phone,
    website: row.website,
    city: row.city,
  }));
  if (repaired || unique.length < rows.length) await writeCsv(filePath, columns, unique, 'overwrite');
  log.info(`${filePath}: ${rows.length} -> ${unique.length} rows${repaired ? `, ${repaired} email cell(s) split` : ''}`);
  return { before: rows.length, after: unique.length, repaired };
}
