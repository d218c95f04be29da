import { z } from 'zod';
import { ConfigError } from './errors.js';

const blankToUndefined = (v: unknown) => (typeof v === 'string' && v.trim() === '' ? undefined : v);

const int = (min: number, max: number, fallback: number) =>
  z.preprocess(blankToUndefined, z.coerce.number().int().min(min).max(max).default(fallback));

const flag = z
  .string()
  .optional()
  .transform((v) => v === '1' || v?.toLowerCase() === 'true');

const EnvSchema = z.object({
  CONCURRENCY: int(1, 100, 5),
  REQUEST_TIMEOUT_MS: int(100, 120_000, 10_000),
  MAX_PAGES: int(1, 10, 5),
  DISCOVER_LINKS: int(0, 5, 2),
  RENDER: flag,
  RENDER_PAGES: int(1, 5, 1),
  SUMMARY_OUT: z.preprocess(blankToUndefined, z.string().optional()),
  APOLLO_API_KEY: z.preprocess(blankToUndefined, z.string().optional()),
  PORT: int(0, 65_535, 3000),
  ORIGINS: z.string().default(''),
  RATE_LIMIT_MAX: int(1, 100_000, 60),
  RATE_LIMIT_WINDOW_MS: int(1000, 3_600_000, 60_000),
});

export interface AppConfig {
  concurrency: number;
  timeoutMs: number;
  maxPages: number;
  discoverLinks: number;
  render: boolean;
  renderPages: number;
  summaryOut?: string;
  apolloApiKey?: string;
  port: number;
  origins: string[];
  rateLimitMax: number;
  rateLimitWindowMs: number;
}

/**
 * Read and validate configuration from environment variables.
 *
 * Environment variables
 * - CONCURRENCY: parallel company inspections (default: 5)
 * - REQUEST_TIMEOUT_MS: per-fetch timeout (default: 10000)
 * - MAX_PAGES: candidate pages per company, homepage included (default: 5)
 * - DISCOVER_LINKS: extra form links taken from the homepage (default: 2)
 * - RENDER / RENDER_PAGES: headless browser fallback and how many pages it may render
 * - SUMMARY_OUT: optional path for a JSON stats summary
 * - APOLLO_API_KEY: key for live company discovery
 * - PORT, ORIGINS: HTTP API port and comma-separated CORS allow list
 * - RATE_LIMIT_MAX / RATE_LIMIT_WINDOW_MS: HTTP API requests per client IP and window
 *
 * @throws ConfigError listing every invalid variable.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new ConfigError(`Invalid configuration: ${issues}`);
  }
  const e = parsed.data;
  return {
    concurrency: e.CONCURRENCY,
    timeoutMs: e.REQUEST_TIMEOUT_MS,
    maxPages: e.MAX_PAGES,
    discoverLinks: e.DISCOVER_LINKS,
    render: e.RENDER,
    renderPages: e.RENDER_PAGES,
    summaryOut: e.SUMMARY_OUT,
    apolloApiKey: e.APOLLO_API_KEY,
    port: e.PORT,
    origins: e.ORIGINS.split(',').map((s) => s.trim()).filter(Boolean),
    rateLimitMax: e.RATE_LIMIT_MAX,
    rateLimitWindowMs: e.RATE_LIMIT_WINDOW_MS,
  };
}

/** Parse an integer command-line flag, falling back when it is absent. */
export function intFlag(value: string | undefined, name: string, fallback: number, min = 1, max = 1000): number {
  if (value === undefined) return fallback;
  const n = Number(value);
  if (!Number.isInteger(n) || n < min || n > max) {
    throw new ConfigError(`--${name} must be an integer between ${min} and ${max}, got "${value}"`);
  }
  return n;
}
