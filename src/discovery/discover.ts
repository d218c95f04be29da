import type { CsvRow } from '../types.js';
import { debug } from '../utils/log.js';
import { searchApollo, type ApolloSearchOptions } from './apollo.js';
import { getVertical, sampleCompanies, type SizeName, type VerticalsDataset } from './verticals.js';

export interface DiscoverOptions {
  verticals: string[];
  /** Per vertical. */
  limit: number;
  /** Live search through Apollo when set, bundled seed lists otherwise. */
  apiKey?: string;
  size?: SizeName;
  search?: (opts: ApolloSearchOptions) => Promise<CsvRow[]>;
  apollo?: Pick<ApolloSearchOptions, 'delayMs' | 'timeoutMs' | 'dispatcher'>;
  onVertical?: (vertical: string, found: number) => void;
}

/**
 * Build a company list for the given verticals, in vertical order.
 * Unknown verticals are rejected before any request is made.
 */
export async function discoverCompanies(dataset: VerticalsDataset, opts: DiscoverOptions): Promise<CsvRow[]> {
  const verticals = opts.verticals.map((name) => getVertical(dataset, name));
  const search = opts.search ?? searchApollo;
  const out: CsvRow[] = [];
  for (const v of verticals) {
    const companies = opts.apiKey
      ? await search({
          apiKey: opts.apiKey,
          vertical: v.name,
          keywords: v.keywords,
          sizeRange: dataset.sizes[opts.size ?? 'mid'],
          limit: opts.limit,
          ...opts.apollo,
        })
      : sampleCompanies(dataset, v.name, opts.limit);
    debug('discover', `${v.name}: ${companies.length} companies`);
    opts.onVertical?.(v.name, companies.length);
    out.push(...companies);
  }
  return out;
}

/** Column order for a list of heterogeneous rows: first-seen order. */
export function collectColumns(rows: CsvRow[]): string[] {
  const cols = new Set<string>();
  for (const r of rows) for (const k of Object.keys(r)) cols.add(k);
  return [...cols];
}
