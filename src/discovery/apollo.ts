import { setTimeout as sleep } from 'node:timers/promises';
import { fetch as undiciFetch, type Dispatcher } from 'undici';
import { z } from 'zod';
import { DiscoveryError, errorMessage } from '../errors.js';
import type { CsvRow } from '../types.js';
import { debug, warn } from '../utils/log.js';

export const APOLLO_SEARCH_URL = 'https://api.apollo.io/v1/mixed_companies/search';

const OrganizationSchema = z.object({
  name: z.string().nullish(),
  website_url: z.string().nullish(),
  industry: z.string().nullish(),
  estimated_num_employees: z.number().nullish(),
  linkedin_url: z.string().nullish(),
  short_description: z.string().nullish(),
});

const SearchResponseSchema = z.object({
  organizations: z.array(OrganizationSchema).default([]),
});

export type ApolloOrganization = z.infer<typeof OrganizationSchema>;

export interface ApolloSearchOptions {
  apiKey: string;
  vertical: string;
  keywords: readonly string[];
  /** Employee count range, inclusive. */
  sizeRange: readonly [number, number];
  limit: number;
  /** Pause between keyword requests (default: 1000ms). */
  delayMs?: number;
  timeoutMs?: number;
  dispatcher?: Dispatcher;
}

/**
 * Search Apollo for companies of a vertical, one request per keyword, until
 * `limit` companies are collected.
 *
 * Auth (401/403) and quota (429) failures abort with a DiscoveryError; any
 * other failure only skips the keyword.
 */
export async function searchApollo(opts: ApolloSearchOptions): Promise<CsvRow[]> {
  const results: CsvRow[] = [];
  const keywords = opts.keywords.length ? opts.keywords : [opts.vertical];

  for (const [i, keyword] of keywords.entries()) {
    if (i > 0 && (opts.delayMs ?? 1000) > 0) await sleep(opts.delayMs ?? 1000);
    const orgs = await searchKeyword(opts, keyword);
    if (!orgs) continue;
    debug('apollo', `${orgs.length} companies for "${keyword}"`);
    results.push(...orgs.map((org) => toCompanyRow(org, opts.vertical, keyword)));
    if (results.length >= opts.limit) break;
  }
  return results.slice(0, opts.limit);
}

async function searchKeyword(opts: ApolloSearchOptions, keyword: string): Promise<ApolloOrganization[] | undefined> {
  let res;
  try {
    res = await undiciFetch(APOLLO_SEARCH_URL, {
      method: 'POST',
      headers: { 'content-type': 'application/json', 'cache-control': 'no-cache', 'x-api-key': opts.apiKey },
      body: JSON.stringify({
        q_organization_keyword_tags: [keyword],
        organization_num_employees_ranges: [`${opts.sizeRange[0]},${opts.sizeRange[1]}`],
        page: 1,
        per_page: Math.min(opts.limit, 100),
      }),
      signal: AbortSignal.timeout(opts.timeoutMs ?? 30_000),
      dispatcher: opts.dispatcher,
    });
  } catch (e) {
    warn('apollo', `Error searching "${keyword}": ${errorMessage(e)}`);
    return undefined;
  }

  if (res.status === 401 || res.status === 403) {
    throw new DiscoveryError('auth', `Apollo rejected the API key (HTTP ${res.status})`, res.status);
  }
  if (res.status === 429) {
    throw new DiscoveryError('quota', 'Apollo rate limit or credit quota exceeded (HTTP 429)', res.status);
  }
  if (!res.ok) {
    warn('apollo', `Error searching "${keyword}": HTTP ${res.status}`);
    return undefined;
  }
  let body: unknown;
  try {
    body = await res.json();
  } catch (e) {
    warn('apollo', `Unreadable response for "${keyword}": ${errorMessage(e)}`);
    return undefined;
  }
  const parsed = SearchResponseSchema.safeParse(body);
  if (!parsed.success) {
    warn('apollo', `Unexpected response for "${keyword}": ${parsed.error.issues[0]?.message ?? 'invalid body'}`);
    return undefined;
  }
  return parsed.data.organizations;
}

export function toCompanyRow(org: ApolloOrganization, vertical: string, keyword: string): CsvRow {
  return {
    company_name: org.name ?? '',
    website: org.website_url ?? '',
    industry: org.industry ?? '',
    employees: org.estimated_num_employees != null ? String(org.estimated_num_employees) : '',
    linkedin: org.linkedin_url ?? '',
    description: (org.short_description ?? '').slice(0, 200),
    source: 'apollo',
    vertical,
    search_keyword: keyword,
  };
}
