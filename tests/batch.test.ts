import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { runBatch, toCompanyRecords } from '../src/scraper/batch.js';
import { inspectCompany } from '../src/scraper/inspector.js';
import { resultToRow } from '../src/scraper/output.js';
import type { PageFetcher } from '../src/scraper/fetcher.js';
import type { CsvTable } from '../src/utils/csv.js';
import { PLAIN_PAGE, TEL_FORM, TIMEOUT, fakeFetcher } from './helpers.js';

const inspectWith = (fetcher: PageFetcher) => (c: Parameters<typeof inspectCompany>[0]) => inspectCompany(c, { fetcher });

function table(rows: Array<Record<string, string>>, columns = ['company_name', 'website']): CsvTable {
  return { columns, rows };
}

describe('runBatch', () => {
  beforeEach(() => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('qualifies a company whose homepage has a tel input', async () => {
    const fetcher = fakeFetcher({ 'https://lemonade.com': TEL_FORM });
    const report = await runBatch(table([{ company_name: 'Lemonade', website: 'lemonade.com' }]), { inspect: inspectWith(fetcher) });
    expect(report.qualified).toHaveLength(1);
    expect(resultToRow(report.qualified[0])).toEqual({
      company_name: 'Lemonade',
      website: 'lemonade.com',
      has_phone_field: 'true',
      matched_page: 'https://lemonade.com',
      matched_rule: '1',
      matched_field: 'input[name="phone"]',
      check_status: 'qualified',
      error_detail: '',
      scraped_description: '',
    });
  });

  it('keeps unreachable companies in the full results with an error', async () => {
    const fetcher = fakeFetcher({}, { fallback: TIMEOUT });
    const report = await runBatch(table([{ company_name: 'Nowhere', website: 'unreachable.invalid' }]), { inspect: inspectWith(fetcher) });
    expect(report.qualified).toEqual([]);
    expect(report.all).toHaveLength(1);
    expect(report.all[0].status).toBe('error');
    expect(resultToRow(report.all[0]).error_detail).toBe('timeout: timed out after 10000ms (https://unreachable.invalid)');
    expect(report.stats).toEqual({ total: 1, inspected: 1, qualified: 0, notQualified: 0, errors: 1, skipped: 0, qualificationRate: 0 });
  });

  it('skips rows without a usable website', async () => {
    const fetcher = fakeFetcher({ 'https://acme.test': PLAIN_PAGE });
    const report = await runBatch(table([
      { company_name: 'Blank', website: '' },
      { company_name: 'Broken', website: 'not a url' },
      { company_name: 'Acme', website: 'acme.test' },
    ]), { inspect: inspectWith(fetcher) });
    expect(report.skipped.map((s) => [s.index, s.reason])).toEqual([[0, 'empty_website'], [1, 'invalid_website']]);
    expect(report.all.map((r) => r.company.name)).toEqual(['Acme']);
    expect(report.stats.total).toBe(3);
    expect(report.stats.skipped).toBe(2);
  });

  it('skips every row when the website column is missing', async () => {
    const inspect = vi.fn(inspectWith(fakeFetcher({})));
    const report = await runBatch(table([{ name: 'Acme' }, { name: 'Beta' }], ['name']), { inspect });
    expect(report.skipped.map((s) => s.reason)).toEqual(['missing_column', 'missing_column']);
    expect(inspect).not.toHaveBeenCalled();
  });

  it('returns results in input order whatever finishes first', async () => {
    const pages = { 'https://slow.test': TEL_FORM, 'https://fast.test': PLAIN_PAGE, 'https://quick.test': TEL_FORM };
    const fast = fakeFetcher(pages);
    const slow = fakeFetcher(pages, { latencyMs: 80 });
    const inspect = (c: Parameters<typeof inspectCompany>[0]) => inspectCompany(c, { fetcher: c.website === 'slow.test' ? slow : fast });
    const report = await runBatch(table([
      { company_name: 'Slow', website: 'slow.test' },
      { company_name: 'Fast', website: 'fast.test' },
      { company_name: 'Quick', website: 'quick.test' },
    ]), { inspect, concurrency: 3 });
    expect(report.all.map((r) => r.company.name)).toEqual(['Slow', 'Fast', 'Quick']);
    expect(report.qualified.map((r) => r.company.name)).toEqual(['Slow', 'Quick']);
    expect(report.stats.qualificationRate).toBe(66.7);
  });

  it('gives the same rows on a second run', async () => {
    const fetcher = fakeFetcher({ 'https://a.test': TEL_FORM, 'https://b.test': PLAIN_PAGE, 'https://c.test/contact': TEL_FORM });
    const input = table([
      { company_name: 'A', website: 'a.test' },
      { company_name: 'B', website: 'b.test' },
      { company_name: 'C', website: 'c.test' },
    ]);
    const first = await runBatch(input, { inspect: inspectWith(fetcher), concurrency: 2 });
    const second = await runBatch(input, { inspect: inspectWith(fetcher), concurrency: 2 });
    expect(second.all.map(resultToRow)).toEqual(first.all.map(resultToRow));
    expect(second.qualified.map((r) => r.company.name)).toEqual(['A', 'C']);
  });

  it('runs companies in parallel up to the concurrency limit', async () => {
    const rows = Array.from({ length: 6 }, (_, i) => ({ company_name: `Co ${i}`, website: `co${i}.test` }));
    const pages = Object.fromEntries(rows.map((r) => [`https://${r.website}`, TEL_FORM]));
    const fetcher = fakeFetcher(pages, { latencyMs: 60 });

    let t0 = performance.now();
    const serial = await runBatch(table(rows), { inspect: inspectWith(fetcher), concurrency: 1 });
    const serialMs = performance.now() - t0;
    t0 = performance.now();
    const parallel = await runBatch(table(rows), { inspect: inspectWith(fetcher), concurrency: 6 });
    const parallelMs = performance.now() - t0;

    expect(parallel.all.map(resultToRow)).toEqual(serial.all.map(resultToRow));
    expect(serialMs).toBeGreaterThanOrEqual(6 * 55);
    expect(parallelMs).toBeLessThan(serialMs / 2);
  });

  it('never runs more than the limit at once', async () => {
    let running = 0;
    let peak = 0;
    const fetcher: PageFetcher = async (url) => {
      running++;
      peak = Math.max(peak, running);
      await new Promise((r) => setTimeout(r, 20));
      running--;
      return { ok: true, url, finalUrl: url, status: 200, html: TEL_FORM };
    };
    const rows = Array.from({ length: 8 }, (_, i) => ({ company_name: `Co ${i}`, website: `co${i}.test` }));
    await runBatch(table(rows), { inspect: inspectWith(fetcher), concurrency: 3 });
    expect(peak).toBe(3);
  });

  it('stops starting companies once interrupted', async () => {
    const controller = new AbortController();
    const inspect = vi.fn(async (c: Parameters<typeof inspectCompany>[0]) =>
      inspectCompany(c, { fetcher: fakeFetcher({ [`https://${c.website}`]: PLAIN_PAGE }) }, { subpages: false }));
    const report = await runBatch(table([
      { company_name: 'A', website: 'a.test' },
      { company_name: 'B', website: 'b.test' },
      { company_name: 'C', website: 'c.test' },
    ]), {
      inspect,
      concurrency: 1,
      signal: controller.signal,
      onResult: () => controller.abort(),
    });
    expect(inspect).toHaveBeenCalledTimes(1);
    expect(report.all.map((r) => r.company.name)).toEqual(['A']);
    expect(report.skipped.map((s) => [s.index, s.reason])).toEqual([[1, 'interrupted'], [2, 'interrupted']]);
  });

  it('lets running companies finish every page after an interrupt', async () => {
    const controller = new AbortController();
    const slow = fakeFetcher({ 'https://b.test': PLAIN_PAGE, 'https://b.test/contact': TEL_FORM }, { latencyMs: 30 });
    const fast = fakeFetcher({ 'https://a.test': TEL_FORM });
    const inspect = (c: Parameters<typeof inspectCompany>[0]) => inspectCompany(c, { fetcher: c.website === 'b.test' ? slow : fast });
    const report = await runBatch(table([
      { company_name: 'A', website: 'a.test' },
      { company_name: 'B', website: 'b.test' },
      { company_name: 'C', website: 'c.test' },
    ]), {
      inspect,
      concurrency: 2,
      signal: controller.signal,
      onResult: () => controller.abort(),
    });
    expect(report.all.map((r) => [r.company.name, r.status, r.matchedPage])).toEqual([
      ['A', 'qualified', 'https://a.test'],
      ['B', 'qualified', 'https://b.test/contact'],
    ]);
    expect(report.skipped.map((s) => [s.index, s.reason])).toEqual([[2, 'interrupted']]);
  });

  it('turns a thrown inspection into an error result', async () => {
    const good = inspectWith(fakeFetcher({ 'https://good.test': TEL_FORM }));
    const inspect = async (c: Parameters<typeof inspectCompany>[0]) => {
      if (c.website === 'bad.test') throw new Error('boom');
      return good(c);
    };
    const report = await runBatch(table([
      { company_name: 'Bad', website: 'bad.test' },
      { company_name: 'Good', website: 'good.test' },
    ]), { inspect });
    expect(report.all.map((r) => r.status)).toEqual(['error', 'qualified']);
    expect(report.all[0].errorDetail).toBe('internal: boom');
  });
});

describe('toCompanyRecords', () => {
  it('finds the website and name under common export headers', () => {
    const { companies } = toCompanyRecords({
      columns: ['Company Name', 'Website URL', 'Industry'],
      rows: [{ 'Company Name': ' Acme ', 'Website URL': 'acme.test', Industry: 'Insurance' }],
    });
    expect(companies).toHaveLength(1);
    expect(companies[0]).toMatchObject({ index: 0, name: 'Acme', website: 'acme.test', industry: 'Insurance' });
    expect(Object.isFrozen(companies[0].row)).toBe(true);
  });

  it('uses an explicit column without aliases', () => {
    const input = { columns: ['homepage', 'website'], rows: [{ homepage: 'acme.test', website: '' }] };
    expect(toCompanyRecords(input, 'homepage').companies.map((c) => c.website)).toEqual(['acme.test']);
    expect(toCompanyRecords(input, 'site').skipped.map((s) => s.reason)).toEqual(['missing_column']);
  });
});
