import fs from 'node:fs';
import path from 'node:path';
import { parse } from 'csv-parse';
import { stringify } from 'csv-stringify/sync';
import { IOError } from '../errors.js';
import { CONTACT_COLUMNS, type ContactRecord } from '../types.js';

export type ExportMode = 'overwrite' | 'append';

export interface CsvTable {
  columns: string[];
  rows: Record<string, string>[];
}

/**
 * Read a CSV file and return its header and rows keyed by header names.
 *
 * Empty lines are skipped; headers are required.
 *
 * @throws IOError when the file is missing or is not valid CSV.
 *
 * @example
 * const { columns, rows } = await readCsvTable('output/designers.csv');
 */
export async function readCsvTable(filePath: string): Promise<CsvTable> {
  const rows: Record<string, string>[] = [];
  let columns: string[] = [];
  const done = new Promise<void>((resolve, reject) => {
    fs.createReadStream(filePath)
      .on('error', reject)
      .pipe(
        parse({
          bom: true,
          skip_empty_lines: true,
          relax_column_count: true,
          columns: (header: string[]) => {
            columns = header;
            return header;
          },
        }),
      )
      .on('data', (row: Record<string, string>) => rows.push(row))
      .on('end', () => resolve())
      .on('error', reject);
  });
  await done.catch((e: unknown) => {
    throw new IOError(filePath, { cause: e, reading: true });
  });
  return { columns, rows };
}

/** Rows of a CSV file as string-keyed objects. */
export async function readCsv(filePath: string): Promise<Record<string, string>[]> {
  return (await readCsvTable(filePath)).rows;
}

/**
 * Write rows in the given column order. Overwrite replaces the file with a
 * header and the rows; append adds rows after the existing content and writes
 * a header only when the file is missing or empty.
 *
 * @returns Number of rows written.
 * @throws IOError when the file or its directory cannot be written.
 */
export async function writeCsv<T extends object>(
  filePath: string,
  columns: readonly (keyof T & string)[],
  rows: readonly T[],
  mode: ExportMode = 'overwrite',
): Promise<number> {
  try {
    await fs.promises.mkdir(path.dirname(path.resolve(filePath)), { recursive: true });
    const existing = mode === 'append' ? await existingSize(filePath) : 0;
    const lines: string[][] = rows.map((row) => columns.map((c) => cell(row[c])));
    if (existing === 0) lines.unshift([...columns]);
    let out = stringify(lines);
    if (existing > 0) {
      if (!(await endsWithNewline(filePath))) out = `\n${out}`;
      await fs.promises.appendFile(filePath, out, 'utf-8');
    } else {
      await fs.promises.writeFile(filePath, out, 'utf-8');
    }
    return rows.length;
  } catch (e) {
    throw new IOError(filePath, { cause: e });
  }
}

/** Contact records in the fixed export column order. */
export function exportCsv(records: readonly ContactRecord[], filePath: string, mode: ExportMode = 'overwrite') {
  return writeCsv(filePath, CONTACT_COLUMNS, records, mode);
}

export function rowToRecord(row: Record<string, string>): ContactRecord | null {
  const name = (row.name ?? '').trim();
  if (!name) return null;
  const value = (key: string) => row[key]?.trim() || undefined;
  return {
    name,
    email: value('email'),
    phone: value('phone'),
    website: value('website'),
    address: value('address'),
    city: value('city'),
    state: value('state'),
    zip_code: value('zip_code'),
    social_media: value('social_media'),
    specialty: value('specialty'),
    source_url: value('source_url'),
  };
}

function cell(value: unknown): string {
  return value === undefined || value === null ? '' : String(value);
}

async function existingSize(filePath: string): Promise<number> {
  try {
    return (await fs.promises.stat(filePath)).size;
  } catch (e) {
    if (isNotFound(e)) return 0;
    throw e;
  }
}

async function endsWithNewline(filePath: string): Promise<boolean> {
  const handle = await fs.promises.open(filePath, 'r');
  try {
    const { size } = await handle.stat();
    const buf = Buffer.alloc(1);
    await handle.read(buf, 0, 1, size - 1);
    return buf[0] === 0x0a;
  } finally {
    await handle.close();
  }
}

function isNotFound(e: unknown) {
  return e instanceof Error && 'code' in e && e.code === 'ENOENT';
}
