import pLimit from 'p-limit';
import type { BatchReport, BatchStats, CompanyRecord, CsvRow, InspectionResult, SkippedRow } from '../types.js';
import type { CsvTable } from '../utils/csv.js';
import { normalizeWebsite } from '../utils/url.js';
import { debug, warn } from '../utils/log.js';
import { errorMessage } from '../errors.js';

export const DEFAULT_CONCURRENCY = 5;

/** Header names accepted for each field when the default column is absent (Apollo, LinkedIn and CRM exports). */
export const COLUMN_ALIASES = {
  website: ['website', 'Website', 'Company Website', 'company_website', 'url', 'URL', 'domain', 'Domain', 'Website URL'],
  name: ['company_name', 'Company', 'Company Name', 'name', 'Name', 'Organization Name', 'Account Name'],
  industry: ['industry', 'Industry', 'Category', 'category', 'Sector', 'vertical'],
} as const;

export type InspectFn = (company: CompanyRecord) => Promise<InspectionResult>;

export interface BatchOptions {
  inspect: InspectFn;
  concurrency?: number;
  /** Website column; `website` also tries the usual aliases. */
  urlColumn?: string;
  /** Interrupt: queued companies are not started, running ones finish. */
  signal?: AbortSignal;
  onResult?: (result: InspectionResult, done: number, total: number) => void;
}

function pickColumn(columns: string[], preferred: string, aliases: readonly string[]) {
  if (columns.includes(preferred)) return preferred;
  return aliases.find((a) => columns.includes(a));
}

/**
 * Turn CSV rows into company records. Rows whose website is missing, empty
 * or unusable are returned as skipped rows with a reason.
 */
export function toCompanyRecords(table: CsvTable, urlColumn = 'website'): { companies: CompanyRecord[]; skipped: SkippedRow[] } {
  const websiteCol = urlColumn === 'website'
    ? pickColumn(table.columns, urlColumn, COLUMN_ALIASES.website)
    : table.columns.includes(urlColumn) ? urlColumn : undefined;
  const nameCol = pickColumn(table.columns, 'company_name', COLUMN_ALIASES.name);
  const industryCol = pickColumn(table.columns, 'industry', COLUMN_ALIASES.industry);
  if (!websiteCol && table.rows.length) warn('batch', `No "${urlColumn}" column found in [${table.columns.join(', ')}]; every row is skipped`);

  const companies: CompanyRecord[] = [];
  const skipped: SkippedRow[] = [];
  table.rows.forEach((row: CsvRow, index) => {
    if (!websiteCol) {
      skipped.push({ index, reason: 'missing_column', row });
      return;
    }
    const website = (row[websiteCol] ?? '').trim();
    if (!website) {
      skipped.push({ index, reason: 'empty_website', row });
      return;
    }
    if (!normalizeWebsite(website)) {
      debug('batch', `row ${index + 1}: invalid website "${website}"`);
      skipped.push({ index, reason: 'invalid_website', row });
      return;
    }
    companies.push({
      index,
      website,
      name: nameCol ? (row[nameCol] ?? '').trim() : '',
      industry: industryCol ? (row[industryCol] ?? '').trim() || undefined : undefined,
      row: Object.freeze({ ...row }),
    });
  });
  return { companies, skipped };
}

/**
 * Inspect every company of a table with at most `concurrency` inspections
 * running at once. Results come back in input order whatever the completion
 * order was.
 *
 * @example
 * const report = await runBatch(table, { inspect: (c) => inspectCompany(c, { fetcher }), concurrency: 10 });
 * console.log(report.stats.qualified, report.qualified.map((r) => r.company.website));
 */
export async function runBatch(table: CsvTable, opts: BatchOptions): Promise<BatchReport> {
  const { companies, skipped } = toCompanyRecords(table, opts.urlColumn);
  const limit = pLimit(Math.max(1, opts.concurrency ?? DEFAULT_CONCURRENCY));
  let done = 0;

  const outcomes = await Promise.all(
    companies.map((company) => limit(async (): Promise<InspectionResult | SkippedRow> => {
      if (opts.signal?.aborted) return { index: company.index, reason: 'interrupted', row: company.row };
      let result: InspectionResult;
      try {
        result = await opts.inspect(company);
      } catch (e) {
        // an inspector bug must not take the other companies down with it
        warn('batch', `inspection of ${company.website} threw: ${errorMessage(e)}`);
        result = {
          company, homepage: normalizeWebsite(company.website) ?? company.website,
          status: 'error', hasPhoneField: false, errorDetail: `internal: ${errorMessage(e)}`, pagesChecked: [],
        };
      }
      done++;
      opts.onResult?.(result, done, companies.length);
      return result;
    }))
  );

  const all: InspectionResult[] = [];
  for (const o of outcomes) {
    if ('reason' in o) skipped.push(o);
    else all.push(o);
  }
  all.sort((a, b) => a.company.index - b.company.index);
  skipped.sort((a, b) => a.index - b.index);
  const qualified = all.filter((r) => r.hasPhoneField);

  return { all, qualified, skipped, stats: summarize(all, skipped, table.rows.length), columns: table.columns };
}

export function summarize(all: InspectionResult[], skipped: SkippedRow[], total: number): BatchStats {
  const qualified = all.filter((r) => r.status === 'qualified').length;
  const errors = all.filter((r) => r.status === 'error').length;
  return {
    total,
    inspected: all.length,
    qualified,
    notQualified: all.length - qualified - errors,
    errors,
    skipped: skipped.length,
    qualificationRate: all.length ? Math.round((qualified / all.length) * 1000) / 10 : 0,
  };
}
