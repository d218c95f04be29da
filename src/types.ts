/** A raw CSV row keyed by header name. */
export type CsvRow = Record<string, string>;

export interface CompanyRecord {
  /** Position of the row in the input, used to restore input order. */
  index: number;
  name: string;
  website: string;
  industry?: string;
  /** Every input column, untouched, in input order. */
  row: Readonly<CsvRow>;
}

export type FetchErrorKind =
  | 'timeout'
  | 'dns'
  | 'connection_refused'
  | 'connection_reset'
  | 'tls'
  | 'http'
  | 'not_html'
  | 'aborted'
  | 'network'
  | 'render';

export interface FetchError {
  kind: FetchErrorKind;
  message: string;
  status?: number;
}

export type FetchResult =
  | { ok: true; url: string; finalUrl: string; status: number; html: string }
  | { ok: false; url: string; error: FetchError };

export type RuleName = 'tel-input' | 'attribute-keyword' | 'label-keyword';

export interface FieldMatch {
  rule: 1 | 2 | 3;
  ruleName: RuleName;
  /** Short CSS-like description of the matched element, e.g. `input[name="phone"]`. */
  element: string;
  /** The attribute value, keyword or phrase that triggered the match. */
  matchedOn: string;
}

export type Detection = { found: false } | { found: true; match: FieldMatch };

export interface PageCheck {
  url: string;
  via: 'fetch' | 'render';
  ok: boolean;
  found: boolean;
  error?: FetchError;
}

export type InspectionStatus = 'qualified' | 'not_qualified' | 'error';

export interface InspectionResult {
  company: CompanyRecord;
  homepage: string;
  status: InspectionStatus;
  hasPhoneField: boolean;
  matchedPage?: string;
  match?: FieldMatch;
  errorDetail?: string;
  /** Homepage meta description, when the input row had no description of its own. */
  scrapedDescription?: string;
  pagesChecked: PageCheck[];
}

export type SkipReason = 'missing_column' | 'empty_website' | 'invalid_website' | 'interrupted';

export interface SkippedRow {
  index: number;
  reason: SkipReason;
  row: Readonly<CsvRow>;
}

export interface BatchStats {
  total: number;
  inspected: number;
  qualified: number;
  notQualified: number;
  errors: number;
  skipped: number;
  /** Percentage of inspected companies that qualified, one decimal. */
  qualificationRate: number;
}

export interface BatchReport {
  /** Every inspection result, in input order. */
  all: InspectionResult[];
  qualified: InspectionResult[];
  skipped: SkippedRow[];
  stats: BatchStats;
  /** Input column order, used when writing outputs. */
  columns: string[];
}
