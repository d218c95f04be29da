import fs from 'node:fs';
import path from 'node:path';
import { parse } from 'csv-parse';
import { parse as parseSync } from 'csv-parse/sync';
import { stringify } from 'csv-stringify/sync';
import { z } from 'zod';
import type { CsvRow } from '../types.js';

export interface CsvTable {
  /** Header names in file order. */
  columns: string[];
  rows: CsvRow[];
}

const RowsSchema = z.array(z.record(z.string()));

const PARSE_OPTIONS = { skip_empty_lines: true, bom: true, trim: false, relax_column_count: true } as const;

/**
 * Read a CSV file and return its header and rows keyed by header names.
 *
 * Notes
 * - Uses streaming parse to avoid loading the whole file into memory.
 * - Empty lines and a leading BOM are skipped; headers are required.
 *
 * @param filePath Absolute or relative path to the CSV file.
 * @example
 * const { columns, rows } = await readCsv('data/companies.csv');
 * console.log(columns, rows[0].website);
 */
export async function readCsv(filePath: string): Promise<CsvTable> {
  const rows: CsvRow[] = [];
  let columns: string[] = [];
  await new Promise<void>((resolve, reject) => {
    fs.createReadStream(filePath)
      .on('error', reject)
      .pipe(parse({ ...PARSE_OPTIONS, columns: (header: string[]) => (columns = header.map((h) => h.trim())) }))
      .on('data', (row: CsvRow) => rows.push(row))
      .on('end', () => resolve())
      .on('error', reject);
  });
  return { columns, rows };
}

/** Parse CSV text already in memory (uploads to the HTTP API). */
export function parseCsvText(text: string): CsvTable {
  let columns: string[] = [];
  const records: unknown = parseSync(text, {
    ...PARSE_OPTIONS,
    columns: (header: string[]) => (columns = header.map((h) => h.trim())),
  });
  return { columns, rows: RowsSchema.parse(records) };
}

/** Serialize rows with a fixed column order; missing cells become empty strings. */
export function toCsv(columns: string[], rows: Array<Record<string, string | number | boolean | undefined>>): string {
  return stringify(rows, {
    header: true,
    columns,
    cast: { boolean: (v) => (v ? 'true' : 'false') },
  });
}

/**
 * Write rows as CSV. The file is written beside the target and renamed into
 * place, so a crash never leaves a half-written file behind.
 */
export function writeCsv(filePath: string, columns: string[], rows: Array<Record<string, string | number | boolean | undefined>>) {
  writeAtomic(filePath, toCsv(columns, rows));
}

/**
 * Write data as pretty-printed JSON to a file.
 *
 * @param filePath Output path; the parent directory is created when missing.
 * @param data Any JSON-serializable value.
 */
export function writeJson(filePath: string, data: unknown) {
  writeAtomic(filePath, JSON.stringify(data, null, 2));
}

function writeAtomic(filePath: string, content: string) {
  const dir = path.dirname(filePath);
  if (!fs.existsSync(dir)) fs.mkdirSync(dir, { recursive: true });
  const tmp = path.join(dir, `.${path.basename(filePath)}.${process.pid}.tmp`);
  fs.writeFileSync(tmp, content, 'utf-8');
  fs.renameSync(tmp, filePath);
}

/** `leads.csv` -> `leads_all.csv`; paths without a .csv extension get the suffix appended. */
export function siblingPath(filePath: string, suffix: string) {
  return /\.csv$/i.test(filePath) ? filePath.replace(/\.csv$/i, `${suffix}.csv`) : `${filePath}${suffix}.csv`;
}
