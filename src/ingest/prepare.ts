import 'dotenv/config';
import { parseArgs } from 'node:util';
import type { CsvRow } from '../types.js';
import { InputError } from '../errors.js';
import { readCsv, writeCsv } from '../utils/csv.js';
import { bareHost } from '../utils/url.js';
import { isMain } from '../utils/main.js';

export const PREPARED_COLUMNS = ['company_name', 'website', 'industry', 'company_size', 'linkedin_url'];

const ALIASES = {
  website: ['Website', 'website', 'Company Website', 'company_website', 'URL', 'url', 'Domain', 'domain'],
  name: ['Company', 'company', 'Company Name', 'company_name', 'Account Name', 'Name', 'name'],
  industry: ['Industry', 'industry', 'Company Industry'],
  size: ['Company Size', 'Employees', 'Employee Count', 'company_size', 'Headcount'],
  linkedin: ['LinkedIn URL', 'Company LinkedIn URL', 'linkedin_url', 'linkedin'],
};

/**
 * Turn a LinkedIn Sales Navigator or CRM export into the columns the lead
 * finder reads. Websites are reduced to a bare host; rows without one and
 * repeated hosts are dropped.
 *
 * @param defaultIndustry Used when the export has no industry column.
 * @throws InputError when no website column is present.
 */
export function prepareExport(columns: string[], rows: CsvRow[], defaultIndustry = 'Insurance'): { rows: CsvRow[]; dropped: number } {
  const pick = (names: string[]) => names.find((n) => columns.includes(n));
  const websiteCol = pick(ALIASES.website);
  if (!websiteCol) throw new InputError(`Could not find a website column. Available columns: ${columns.join(', ')}`);
  const nameCol = pick(ALIASES.name);
  const industryCol = pick(ALIASES.industry);
  const sizeCol = pick(ALIASES.size);
  const linkedinCol = pick(ALIASES.linkedin);

  const seen = new Set<string>();
  const out: CsvRow[] = [];
  for (const row of rows) {
    const website = bareHost(row[websiteCol] ?? '');
    if (!website || seen.has(website)) continue;
    seen.add(website);
    out.push({
      company_name: nameCol ? (row[nameCol] ?? '').trim() : '',
      website,
      industry: industryCol ? (row[industryCol] ?? '').trim() : defaultIndustry,
      company_size: sizeCol ? (row[sizeCol] ?? '').trim() : '',
      linkedin_url: linkedinCol ? (row[linkedinCol] ?? '').trim() : '',
    });
  }
  return { rows: out, dropped: rows.length - out.length };
}

async function main() {
  const { values } = parseArgs({
    options: {
      input: { type: 'string', short: 'i' },
      output: { type: 'string', short: 'o', default: 'companies.csv' },
    },
  });
  if (!values.input) throw new InputError('--input is required');
  const table = await readCsv(values.input);
  console.log(`Found columns: ${table.columns.join(', ')}`);
  const { rows, dropped } = prepareExport(table.columns, table.rows);
  writeCsv(values.output, PREPARED_COLUMNS, rows);
  console.log(`Prepared ${rows.length} companies (${dropped} without website or duplicate) -> ${values.output}`);
}

if (isMain(import.meta.url)) {
  main().catch((e) => {
    console.error(e);
    process.exit(1);
  });
}
