import type { CompanyRecord, FetchError, FieldMatch, InspectionResult, PageCheck } from '../types.js';
import { normalizeWebsite } from '../utils/url.js';
import { debug } from '../utils/log.js';
import { errorMessage } from '../errors.js';
import { detectPhoneField, type DetectOptions } from './detector.js';
import { extractMetaDescription, hasDescription } from './meta.js';
import type { PageFetcher } from './fetcher.js';
import type { PageRenderer } from './renderer.js';
import { DEFAULT_MAX_PAGES, discoverFormLinks, resolveCandidatePages } from './pages.js';

export interface InspectorDeps {
  fetcher: PageFetcher;
  /** Optional headless fallback for pages whose static HTML shows no phone field. */
  renderer?: PageRenderer;
}

export interface InspectOptions {
  subpages?: boolean;
  maxPages?: number;
  /** Form links taken from the homepage on top of the fixed candidates. */
  discoverLinks?: number;
  /** How many successfully fetched pages the renderer may re-check. */
  renderPages?: number;
  detect?: DetectOptions;
}

/** Errors after which the rest of the host is not worth trying. */
const HOST_LEVEL_ERRORS = new Set<FetchError['kind']>(['dns', 'connection_refused']);

/**
 * Check one company's candidate pages for a phone-capture field.
 *
 * Pages are fetched one after another and the first positive page ends the
 * check. When nothing matched and every fetch failed the result is tagged
 * `error` rather than `not_qualified`, so "could not check" never reads as
 * "no phone field". A website that does not normalize is an `error` too.
 */
export async function inspectCompany(company: CompanyRecord, deps: InspectorDeps, opts: InspectOptions = {}): Promise<InspectionResult> {
  const homepage = normalizeWebsite(company.website) ?? company.website;
  const queue = resolveCandidatePages(company.website, { subpages: opts.subpages, maxPages: opts.maxPages ?? DEFAULT_MAX_PAGES });
  const checks: PageCheck[] = [];
  const fetched: string[] = [];
  let firstError: { url: string; error: FetchError } | undefined;
  let scrapedDescription: string | undefined;

  if (!queue.length) {
    return {
      company, homepage, status: 'error', hasPhoneField: false, pagesChecked: checks,
      errorDetail: `invalid_website: ${company.website}`,
    };
  }

  const finish = (match?: { page: string; field: FieldMatch }): InspectionResult => {
    if (match) {
      return {
        company, homepage, status: 'qualified', hasPhoneField: true,
        matchedPage: match.page, match: match.field, scrapedDescription, pagesChecked: checks,
      };
    }
    if (fetched.length === 0 && firstError) {
      return {
        company, homepage, status: 'error', hasPhoneField: false, pagesChecked: checks,
        errorDetail: `${firstError.error.kind}: ${firstError.error.message} (${firstError.url})`,
      };
    }
    return { company, homepage, status: 'not_qualified', hasPhoneField: false, scrapedDescription, pagesChecked: checks };
  };

  for (let i = 0; i < queue.length; i++) {
    const url = queue[i];
    const page = await deps.fetcher(url);
    if (!page.ok) {
      checks.push({ url, via: 'fetch', ok: false, found: false, error: page.error });
      firstError ??= { url, error: page.error };
      if (i === 0 && HOST_LEVEL_ERRORS.has(page.error.kind)) {
        debug('inspect', `${url} unreachable (${page.error.kind}), skipping subpages`);
        break;
      }
      continue;
    }
    fetched.push(page.finalUrl || url);
    if (i === 0 && !hasDescription(company.row)) scrapedDescription = extractMetaDescription(page.html);
    const detection = detectPhoneField(page.html, opts.detect);
    checks.push({ url, via: 'fetch', ok: true, found: detection.found });
    if (detection.found) return finish({ page: url, field: detection.match });

    if (i === 0 && opts.subpages !== false && (opts.discoverLinks ?? 0) > 0) {
      const extra = discoverFormLinks(page.html, page.finalUrl || url, opts.discoverLinks ?? 0, queue);
      if (extra.length) debug('inspect', `${url}: discovered ${extra.join(', ')}`);
      queue.push(...extra);
    }
  }

  if (deps.renderer && fetched.length > 0) {
    const pages = checks.filter((c) => c.ok).map((c) => c.url).slice(0, Math.max(1, opts.renderPages ?? 1));
    for (const url of pages) {
      try {
        const html = await deps.renderer.render(url);
        const detection = detectPhoneField(html, opts.detect);
        checks.push({ url, via: 'render', ok: true, found: detection.found });
        if (detection.found) return finish({ page: url, field: detection.match });
      } catch (e) {
        debug('inspect', `render ${url} failed: ${errorMessage(e)}`);
        checks.push({ url, via: 'render', ok: false, found: false, error: { kind: 'render', message: errorMessage(e).slice(0, 200) } });
      }
    }
  }

  return finish();
}
