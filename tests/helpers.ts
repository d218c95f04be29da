import { setTimeout as sleep } from 'node:timers/promises';
import type { CompanyRecord, FetchError, FetchResult } from '../src/types.js';
import type { PageFetcher } from '../src/scraper/fetcher.js';

export type FakePage = string | FetchError;

export interface FakeFetcherOptions {
  /** Delay before every response. */
  latencyMs?: number;
  /** Pages not listed fall back to this (default: HTTP 404). */
  fallback?: FetchError;
  calls?: string[];
}

/** In-process stand-in for the network: a map from URL to HTML or error. */
export function fakeFetcher(pages: Record<string, FakePage>, opts: FakeFetcherOptions = {}): PageFetcher {
  return async (url: string): Promise<FetchResult> => {
    opts.calls?.push(url);
    if (opts.latencyMs) await sleep(opts.latencyMs);
    const page = pages[url] ?? opts.fallback ?? { kind: 'http', status: 404, message: 'HTTP 404' };
    if (typeof page === 'string') return { ok: true, url, finalUrl: url, status: 200, html: page };
    return { ok: false, url, error: page };
  };
}

export function company(website: string, index = 0, row: Record<string, string> = {}): CompanyRecord {
  return { index, name: row.company_name ?? '', website, row: { website, ...row } };
}

export const REFUSED: FetchError = { kind: 'connection_refused', message: 'connect ECONNREFUSED' };
export const TIMEOUT: FetchError = { kind: 'timeout', message: 'timed out after 10000ms' };

export const TEL_FORM = '<html><body><form><input type="text" name="name"><input type="tel" name="phone"></form></body></html>';
export const PLAIN_PAGE = '<html><body><h1>Welcome</h1><form><input type="email" name="email"><button>Go</button></form></body></html>';
