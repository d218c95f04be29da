import 'dotenv/config';
import fs from 'node:fs';
import { parseArgs } from 'node:util';
import { z } from 'zod';
import type { CsvRow } from '../types.js';
import { InputError } from '../errors.js';
import { readCsv, siblingPath, writeCsv } from '../utils/csv.js';
import { isMain } from '../utils/main.js';

export const DEFAULT_KEYWORDS_PATH = 'data/b2b-keywords.json';

/** Columns whose text is searched for B2B/B2C keywords, when present. */
export const TEXT_COLUMNS = [
  'company_name', 'Company', 'Name', 'name',
  'description', 'Description', 'Company Description',
  'industry', 'Industry', 'Specialties', 'specialties',
  'tagline', 'Tagline', 'headline', 'Headline',
];

const KeywordsSchema = z.object({
  b2b: z.array(z.string().min(1)),
  b2c: z.array(z.string().min(1)),
});

export type B2bKeywords = z.infer<typeof KeywordsSchema>;

export function loadB2bKeywords(filePath = DEFAULT_KEYWORDS_PATH): B2bKeywords {
  const raw = KeywordsSchema.parse(JSON.parse(fs.readFileSync(filePath, 'utf-8')));
  return { b2b: raw.b2b.map((k) => k.toLowerCase()), b2c: raw.b2c.map((k) => k.toLowerCase()) };
}

/**
 * Consumer keywords win over business ones: "pet insurance platform" stays,
 * "insurance platform" goes. Text with neither is kept.
 */
export function isB2b(text: string, keywords: B2bKeywords): boolean {
  const lower = text.toLowerCase();
  if (keywords.b2c.some((k) => lower.includes(k))) return false;
  return keywords.b2b.some((k) => lower.includes(k));
}

export function filterB2b(columns: string[], rows: CsvRow[], keywords: B2bKeywords) {
  const textCols = TEXT_COLUMNS.filter((c) => columns.includes(c));
  const kept: CsvRow[] = [];
  const removed: CsvRow[] = [];
  for (const row of rows) {
    const text = textCols.map((c) => row[c] ?? '').join(' ');
    (isB2b(text, keywords) ? removed : kept).push(row);
  }
  return { kept, removed };
}

async function main() {
  const { values } = parseArgs({
    options: {
      input: { type: 'string', short: 'i' },
      output: { type: 'string', short: 'o', default: 'b2c_companies.csv' },
      keywords: { type: 'string', default: DEFAULT_KEYWORDS_PATH },
    },
  });
  if (!values.input) throw new InputError('--input is required');
  const { columns, rows } = await readCsv(values.input);
  const { kept, removed } = filterB2b(columns, rows, loadB2bKeywords(values.keywords));

  const removedPath = siblingPath(values.output, '_b2b_removed');
  writeCsv(values.output, columns, kept);
  writeCsv(removedPath, columns, removed);
  console.log(`Total companies: ${rows.length}`);
  console.log(`  B2C (kept):     ${kept.length} -> ${values.output}`);
  console.log(`  B2B (removed):  ${removed.length} -> ${removedPath}`);
}

if (isMain(import.meta.url)) {
  main().catch((e) => {
    console.error(e);
    process.exit(1);
  });
}
