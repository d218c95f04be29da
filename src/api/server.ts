import 'dotenv/config';
import Fastify, { type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import { z } from 'zod';
import { loadConfig, type AppConfig } from '../config.js';
import { parseCsvText, toCsv, type CsvTable } from '../utils/csv.js';
import { isMain } from '../utils/main.js';
import { createFetcher } from '../scraper/fetcher.js';
import { inspectCompany } from '../scraper/inspector.js';
import { runBatch, type InspectFn } from '../scraper/batch.js';
import { ALL_COLUMNS, outputColumns, resultToRow, skippedToRow } from '../scraper/output.js';

export const MAX_COMPANIES = 1000;

const cell = z.union([z.string(), z.number(), z.boolean(), z.null()]).transform((v) => (v === null ? '' : String(v)));

const CheckBodySchema = z.object({
  companies: z.array(z.record(cell)).min(1).max(MAX_COMPANIES),
  subpages: z.boolean().optional(),
  urlColumn: z.string().trim().min(1).max(128).optional(),
});

const CheckQuerySchema = z.object({
  subpages: z.enum(['true', 'false']).optional(),
  urlColumn: z.string().trim().min(1).max(128).optional(),
});

const DownloadBodySchema = z.object({
  results: z.array(z.record(z.string())).max(MAX_COMPANIES * 2),
  filter: z.enum(['qualified', 'not_qualified', 'all']).default('qualified'),
});

export interface AppOptions {
  config?: AppConfig;
  /** Replaces the network-backed inspector (tests). */
  inspect?: (opts: { subpages: boolean }) => InspectFn;
}

export interface RateLimiter {
  hit(key: string, now?: number): { allowed: boolean; retryAfterMs: number };
  /** Keys currently tracked. */
  readonly size: number;
}

/**
 * Fixed-window in-memory limiter keyed by client IP. Expired windows are
 * swept at most once per window length.
 */
export function createRateLimiter(max: number, windowMs: number): RateLimiter {
  const buckets = new Map<string, { n: number; reset: number }>();
  let nextSweep = 0;
  return {
    hit(key, now = Date.now()) {
      if (now > nextSweep) {
        for (const [k, b] of buckets) if (now > b.reset) buckets.delete(k);
        nextSweep = now + windowMs;
      }
      let b = buckets.get(key);
      if (!b || now > b.reset) { b = { n: 0, reset: now + windowMs }; buckets.set(key, b); }
      b.n++;
      return { allowed: b.n <= max, retryAfterMs: Math.max(0, b.reset - now) };
    },
    get size() {
      return buckets.size;
    },
  };
}

class HttpError extends Error {
  constructor(readonly statusCode: number, message: string) {
    super(message);
  }
}

/**
 * HTTP front end for the batch runner: upload a company list, get every
 * verdict back, download the filtered list as CSV.
 */
export async function buildApp(opts: AppOptions = {}): Promise<FastifyInstance> {
  const config = opts.config ?? loadConfig();
  const app = Fastify({
    trustProxy: true,
    logger: process.env.DEBUG_API ? { level: 'info' } : false,
    bodyLimit: 5 * 1024 * 1024,
  });

  await app.register(cors, config.origins.length ? {
    origin: (origin, cb) => {
      if (!origin) return cb(null, true);
      cb(null, config.origins.includes(origin));
    },
    credentials: false,
  } : { origin: false });

  app.addContentTypeParser(['text/csv', 'text/plain'], { parseAs: 'string' }, (_req, body, done) => done(null, body));

  app.addHook('onSend', async (_req, res, payload) => {
    res.header('X-Content-Type-Options', 'nosniff');
    res.header('X-Frame-Options', 'DENY');
    res.header('Referrer-Policy', 'no-referrer');
    res.header('Content-Security-Policy', "default-src 'none'; frame-ancestors 'none'");
    if (process.env.NODE_ENV === 'production') {
      res.header('Strict-Transport-Security', 'max-age=31536000; includeSubDomains');
    }
    return payload;
  });

  // /check fans out to many sites per call
  const limiter = createRateLimiter(config.rateLimitMax, config.rateLimitWindowMs);
  app.addHook('onRequest', async (req, res) => {
    if (req.url === '/health') return;
    const hit = limiter.hit(req.ip || 'unknown');
    if (!hit.allowed) {
      return res.code(429).send({ error: 'Too Many Requests', retryAfterMs: hit.retryAfterMs });
    }
  });

  const makeInspect = opts.inspect ?? ((o: { subpages: boolean }): InspectFn => {
    const fetcher = createFetcher({ timeoutMs: config.timeoutMs });
    return (company) => inspectCompany(company, { fetcher }, {
      subpages: o.subpages,
      maxPages: config.maxPages,
      discoverLinks: config.discoverLinks,
    });
  });

  app.setErrorHandler((err, _req, res) => {
    const status = err.statusCode ?? 500;
    if (status >= 500) app.log.error(err);
    res.code(status).send({ error: status >= 500 ? 'Internal Server Error' : err.message, status });
  });
  app.setNotFoundHandler((_req, res) => res.code(404).send({ error: 'Not Found', status: 404 }));

  app.get('/health', async () => ({ ok: true }));

  app.post('/check', async (req, res) => {
    let table: CsvTable;
    let subpages = true;
    let urlColumn: string | undefined;
    if (typeof req.body === 'string') {
      const query = CheckQuerySchema.safeParse(req.query ?? {});
      if (!query.success) return res.code(400).send({ error: 'Invalid query', issues: query.error.issues });
      try {
        table = parseCsvText(req.body);
      } catch (e) {
        throw new HttpError(400, `Invalid CSV: ${e instanceof Error ? e.message : String(e)}`);
      }
      if (!table.rows.length) return res.code(400).send({ error: 'CSV file is empty' });
      if (table.rows.length > MAX_COMPANIES) return res.code(400).send({ error: `At most ${MAX_COMPANIES} companies per request` });
      subpages = query.data.subpages !== 'false';
      urlColumn = query.data.urlColumn;
    } else {
      const parsed = CheckBodySchema.safeParse(req.body ?? {});
      if (!parsed.success) return res.code(400).send({ error: 'Invalid request', issues: parsed.error.issues });
      const columns = [...new Set(parsed.data.companies.flatMap((c) => Object.keys(c)))];
      table = { columns, rows: parsed.data.companies };
      subpages = parsed.data.subpages ?? true;
      urlColumn = parsed.data.urlColumn;
    }

    const t0 = Date.now();
    const report = await runBatch(table, { inspect: makeInspect({ subpages }), concurrency: config.concurrency, urlColumn });
    return res.send({
      columns: outputColumns(report.columns, ALL_COLUMNS),
      results: report.all.map(resultToRow),
      skipped: report.skipped.map(skippedToRow),
      stats: report.stats,
      meta: { totalMs: Date.now() - t0 },
    });
  });

  app.post('/download', async (req, res) => {
    const parsed = DownloadBodySchema.safeParse(req.body ?? {});
    if (!parsed.success) return res.code(400).send({ error: 'Invalid request', issues: parsed.error.issues });
    const { results, filter } = parsed.data;
    const rows = results.filter((r) => {
      if (filter === 'qualified') return r.has_phone_field === 'true';
      if (filter === 'not_qualified') return r.has_phone_field !== 'true' && r.check_status !== 'error';
      return true;
    });
    const columns = [...new Set(results.flatMap((r) => Object.keys(r)))];
    return res
      .header('content-type', 'text/csv; charset=utf-8')
      .header('content-disposition', `attachment; filename="${filter}_leads.csv"`)
      .send(rows.length ? toCsv(columns, rows) : '');
  });

  return app;
}

async function main() {
  const config = loadConfig();
  const app = await buildApp({ config });
  await app.listen({ port: config.port, host: '0.0.0.0' });
  console.log(`API running on http://localhost:${config.port}`);
}

if (isMain(import.meta.url)) {
  main().catch((e) => { console.error(e); process.exit(1); });
}
