import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { MockAgent } from 'undici';
import { DiscoveryError } from '../src/errors.js';
import { searchApollo, toCompanyRow, type ApolloSearchOptions } from '../src/discovery/apollo.js';
import { collectColumns, discoverCompanies } from '../src/discovery/discover.js';
import { getVertical, loadVerticals, parseVerticals, sampleCompanies } from '../src/discovery/verticals.js';
import type { CsvRow } from '../src/types.js';

const dataset = loadVerticals();

describe('verticals dataset', () => {
  it('loads the bundled verticals', () => {
    expect([...dataset.verticals.keys()]).toEqual(['insurance', 'education', 'finance', 'real_estate', 'ecommerce']);
    expect(dataset.sizes.mid).toEqual([50, 500]);
    expect(getVertical(dataset, 'insurance').keywords[0]).toBe('insurance company');
  });

  it('cannot be changed after loading', () => {
    const map = dataset.verticals;
    if (!(map instanceof Map)) throw new Error('expected a Map');
    expect(() => map.set('travel', { name: 'travel', keywords: [], companies: [] })).toThrow('verticals dataset is read-only');
    expect(() => map.clear()).toThrow(TypeError);
    expect(Object.isFrozen(dataset)).toBe(true);
    expect(Object.isFrozen(getVertical(dataset, 'finance').companies)).toBe(true);
  });

  it('samples seed companies tagged with their vertical', () => {
    const rows = sampleCompanies(dataset, 'insurance', 3);
    expect(rows).toHaveLength(3);
    expect(rows[0]).toEqual({ company_name: 'Lemonade', website: 'lemonade.com', vertical: 'insurance' });
  });

  it('rejects unknown verticals', () => {
    expect(() => getVertical(dataset, 'space')).toThrow(DiscoveryError);
    try {
      getVertical(dataset, 'space');
    } catch (e) {
      expect(e instanceof DiscoveryError && e.kind).toBe('unknown_vertical');
    }
  });

  it('validates the file shape', () => {
    expect(() => parseVerticals({ sizes: {}, verticals: {} })).toThrow();
    expect(() => parseVerticals({
      sizes: { small: [1, 2], mid: [2, 3], large: [3, 4] },
      verticals: { empty: { keywords: [], companies: [] } },
    })).toThrow();
  });
});

describe('discoverCompanies', () => {
  it('uses the seed lists without an API key', async () => {
    const seen: Array<[string, number]> = [];
    const rows = await discoverCompanies(dataset, {
      verticals: ['insurance', 'finance'],
      limit: 2,
      onVertical: (v, n) => seen.push([v, n]),
    });
    expect(rows.map((r) => r.website)).toEqual(['lemonade.com', 'root.com', 'robinhood.com', 'coinbase.com']);
    expect(seen).toEqual([['insurance', 2], ['finance', 2]]);
  });

  it('searches with the vertical keywords and size range', async () => {
    const calls: ApolloSearchOptions[] = [];
    const search = async (o: ApolloSearchOptions): Promise<CsvRow[]> => {
      calls.push(o);
      return [{ company_name: `${o.vertical} co`, website: `${o.vertical}.test`, source: 'apollo' }];
    };
    const rows = await discoverCompanies(dataset, { verticals: ['education'], limit: 5, apiKey: 'test-key', size: 'small', search });
    expect(rows).toEqual([{ company_name: 'education co', website: 'education.test', source: 'apollo' }]);
    expect(calls[0]).toMatchObject({ apiKey: 'test-key', vertical: 'education', sizeRange: [10, 50], limit: 5 });
    expect(calls[0].keywords[0]).toBe('coding bootcamp');
  });

  it('checks every vertical before searching', async () => {
    const search = vi.fn(async (): Promise<CsvRow[]> => []);
    await expect(discoverCompanies(dataset, { verticals: ['insurance', 'space'], limit: 1, apiKey: 'test-key', search }))
      .rejects.toThrow(DiscoveryError);
    expect(search).not.toHaveBeenCalled();
  });

  it('collects columns in first-seen order', () => {
    expect(collectColumns([{ a: '1', b: '2' }, { b: '3', c: '4' }])).toEqual(['a', 'b', 'c']);
  });
});

describe('searchApollo', () => {
  const ORIGIN = 'https://api.apollo.io';
  const PATH = '/v1/mixed_companies/search';
  let agent: MockAgent;

  const options = (overrides: Partial<ApolloSearchOptions> = {}): ApolloSearchOptions => ({
    apiKey: 'test-key',
    vertical: 'insurance',
    keywords: ['pet insurance', 'life insurance'],
    sizeRange: [50, 500],
    limit: 3,
    delayMs: 0,
    dispatcher: agent,
    ...overrides,
  });

  beforeEach(() => {
    agent = new MockAgent();
    agent.disableNetConnect();
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await agent.close();
  });

  it('sends one request per keyword and maps organizations to rows', async () => {
    const bodies: unknown[] = [];
    const pool = agent.get(ORIGIN);
    const capture = (body: string) => {
      bodies.push(JSON.parse(body));
      return true;
    };
    pool.intercept({ path: PATH, method: 'POST', headers: { 'x-api-key': 'test-key' }, body: capture }).reply(200, {
      organizations: [
        { name: 'Paws Co', website_url: 'http://pawsco.test', industry: 'insurance', estimated_num_employees: 120, linkedin_url: null, short_description: 'x'.repeat(250) },
        { name: 'Tails', website_url: 'http://tails.test' },
      ],
    });
    pool.intercept({ path: PATH, method: 'POST', body: capture }).reply(200, {
      organizations: [{ name: 'Evergreen Life', website_url: 'http://evergreen.test' }, { name: 'Oak Life', website_url: 'http://oak.test' }],
    });

    const rows = await searchApollo(options());
    expect(rows.map((r) => r.company_name)).toEqual(['Paws Co', 'Tails', 'Evergreen Life']);
    expect(rows[0]).toMatchObject({ employees: '120', linkedin: '', source: 'apollo', vertical: 'insurance', search_keyword: 'pet insurance' });
    expect(rows[0].description).toHaveLength(200);
    expect(rows[2].search_keyword).toBe('life insurance');
    expect(bodies[0]).toEqual({
      q_organization_keyword_tags: ['pet insurance'],
      organization_num_employees_ranges: ['50,500'],
      page: 1,
      per_page: 3,
    });
  });

  it('stops once the limit is reached', async () => {
    agent.get(ORIGIN).intercept({ path: PATH, method: 'POST' }).reply(200, {
      organizations: [{ name: 'A' }, { name: 'B' }, { name: 'C' }],
    });
    const rows = await searchApollo(options());
    expect(rows).toHaveLength(3);
  });

  it('rejects a bad API key', async () => {
    agent.get(ORIGIN).intercept({ path: PATH, method: 'POST' }).reply(401, { error: 'unauthorized' });
    const err = await searchApollo(options()).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(DiscoveryError);
    expect(err instanceof DiscoveryError && [err.kind, err.status]).toEqual(['auth', 401]);
  });

  it('rejects when the quota is used up', async () => {
    agent.get(ORIGIN).intercept({ path: PATH, method: 'POST' }).reply(429, { error: 'too many requests' });
    const err = await searchApollo(options()).catch((e: unknown) => e);
    expect(err instanceof DiscoveryError && err.kind).toBe('quota');
  });

  it('skips a keyword that fails with a server error', async () => {
    const pool = agent.get(ORIGIN);
    pool.intercept({ path: PATH, method: 'POST' }).reply(500, { error: 'oops' });
    pool.intercept({ path: PATH, method: 'POST' }).reply(200, { organizations: [{ name: 'Oak Life', website_url: 'http://oak.test' }] });
    const rows = await searchApollo(options());
    expect(rows.map((r) => r.company_name)).toEqual(['Oak Life']);
    expect(console.warn).toHaveBeenCalledTimes(1);
  });

  it('maps missing fields to empty strings', () => {
    expect(toCompanyRow({ name: 'Bare' }, 'finance', 'fintech')).toEqual({
      company_name: 'Bare', website: '', industry: '', employees: '', linkedin: '', description: '',
      source: 'apollo', vertical: 'finance', search_keyword: 'fintech',
    });
  });
});
