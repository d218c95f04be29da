import type { BatchReport, InspectionResult, SkippedRow } from '../types.js';
import { siblingPath, writeCsv, writeJson } from '../utils/csv.js';

export const QUALIFIED_COLUMNS = ['has_phone_field', 'matched_page', 'matched_rule', 'matched_field'] as const;
export const ALL_COLUMNS = [...QUALIFIED_COLUMNS, 'check_status', 'error_detail', 'scraped_description'] as const;

export type OutputRow = Record<string, string>;

/** Input columns first (minus any that collide with ours), then the result columns. */
export function outputColumns(inputColumns: string[], extra: readonly string[]) {
  return [...inputColumns.filter((c) => !extra.includes(c)), ...extra];
}

export function resultToRow(result: InspectionResult): OutputRow {
  return {
    ...result.company.row,
    has_phone_field: result.hasPhoneField ? 'true' : 'false',
    matched_page: result.matchedPage ?? '',
    matched_rule: result.match ? String(result.match.rule) : '',
    matched_field: result.match?.element ?? '',
    check_status: result.status,
    error_detail: result.errorDetail ?? '',
    scraped_description: result.scrapedDescription ?? '',
  };
}

export function skippedToRow(s: SkippedRow): OutputRow {
  return { ...s.row, skip_reason: s.reason };
}

export interface WrittenOutputs {
  qualifiedPath: string;
  allPath: string;
  skippedPath?: string;
  summaryPath?: string;
}

/**
 * Write the qualified list to `outputPath` and every result to
 * `<output>_all.csv`. Skipped rows go to `<output>_skipped.csv` when there are
 * any; a JSON stats summary is written when `summaryPath` is given.
 */
export function writeBatchOutputs(report: BatchReport, outputPath: string, summaryPath?: string): WrittenOutputs {
  const allPath = siblingPath(outputPath, '_all');
  writeCsv(outputPath, outputColumns(report.columns, QUALIFIED_COLUMNS), report.qualified.map(resultToRow));
  writeCsv(allPath, outputColumns(report.columns, ALL_COLUMNS), report.all.map(resultToRow));

  const written: WrittenOutputs = { qualifiedPath: outputPath, allPath };
  if (report.skipped.length) {
    written.skippedPath = siblingPath(outputPath, '_skipped');
    writeCsv(written.skippedPath, outputColumns(report.columns, ['skip_reason']), report.skipped.map(skippedToRow));
  }
  if (summaryPath) {
    writeJson(summaryPath, {
      stats: report.stats,
      skipped: report.skipped.map((s) => ({ row: s.index + 1, reason: s.reason })),
    });
    written.summaryPath = summaryPath;
  }
  return written;
}
