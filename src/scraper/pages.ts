import * as cheerio from 'cheerio';
import { normalizeWebsite } from '../utils/url.js';

/** Common form-page paths, interleaved so a small cap still covers contact, quote and demo pages. */
export const CANDIDATE_PATHS = ['/contact', '/quote', '/demo', '/contact-us', '/get-a-quote', '/request-demo'] as const;

export const DEFAULT_MAX_PAGES = 5;

const FORM_LINK_PATTERNS = [
  /contact/i, /quote/i, /demo/i, /sign-?up/i, /register/i, /get-?started/i,
  /trial/i, /apply/i, /enrol/i, /inquiry/i, /enquiry/i, /request/i,
];

export interface PageSetOptions {
  /** When false only the homepage is returned. */
  subpages?: boolean;
  /** Total pages including the homepage. */
  maxPages?: number;
}

/**
 * Build the ordered list of pages to check for one company: the homepage,
 * then the common form paths, capped at `maxPages`. A new array is built on
 * every call.
 *
 * @param website Raw website value, scheme optional.
 * @returns An empty list when the website is not usable.
 * @example
 * resolveCandidatePages('example.com', { maxPages: 3 });
 * // ['https://example.com', 'https://example.com/contact', 'https://example.com/quote']
 */
export function resolveCandidatePages(website: string, opts: PageSetOptions = {}): string[] {
  const homepage = normalizeWebsite(website);
  if (!homepage) return [];
  if (opts.subpages === false) return [homepage];
  const max = Math.max(1, opts.maxPages ?? DEFAULT_MAX_PAGES);
  const pages = [homepage, ...CANDIDATE_PATHS.map((p) => `${homepage}${p}`)];
  return pages.slice(0, max);
}

/**
 * Find same-host links on a page that look like they lead to a form
 * (contact, quote, demo, signup...).
 *
 * @param exclude URLs already queued; compared without trailing slash or hash.
 */
export function discoverFormLinks(html: string, pageUrl: string, limit: number, exclude: Iterable<string> = []): string[] {
  if (limit <= 0) return [];
  let base: URL;
  try {
    base = new URL(pageUrl);
  } catch {
    return [];
  }
  const seen = new Set(Array.from(exclude, linkKey));
  seen.add(linkKey(pageUrl));
  const out: string[] = [];
  const $ = cheerio.load(html);
  for (const el of $('a[href]').toArray()) {
    const href = String($(el).attr('href') || '').trim();
    const text = $(el).text().trim();
    if (!href || /^(mailto|tel|javascript):/i.test(href) || href.startsWith('#')) continue;
    if (!FORM_LINK_PATTERNS.some((p) => p.test(href) || p.test(text))) continue;
    let abs: URL;
    try {
      abs = new URL(href, base);
    } catch {
      continue;
    }
    if (abs.hostname !== base.hostname) continue;
    abs.hash = '';
    const url = abs.toString().replace(/\/$/, '');
    const key = linkKey(url);
    if (seen.has(key)) continue;
    seen.add(key);
    out.push(url);
    if (out.length >= limit) break;
  }
  return out;
}

function linkKey(u: string) {
  return u.split('#')[0].replace(/\/+$/, '').toLowerCase();
}
