import { fetch as undiciFetch, setGlobalDispatcher, ProxyAgent, Agent, type Dispatcher } from 'undici';
import type { FetchError, FetchResult } from '../types.js';
import { debug } from '../utils/log.js';

export const DEFAULT_TIMEOUT_MS = 10_000;

const USER_AGENTS = [
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/125 Safari/537.36',
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 13_4) AppleWebKit/605.1.15 (KHTML, like Gecko) Version/17.0 Safari/605.1.15',
  'Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124 Safari/537.36',
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64; rv:125.0) Gecko/20100101 Firefox/125.0',
];

export interface FetchOptions {
  timeoutMs?: number;
  /** Aborts the request from outside. */
  signal?: AbortSignal;
  /** Defaults to undici's global dispatcher; tests pass a MockAgent. */
  dispatcher?: Dispatcher;
}

/** Fetches one page and always resolves with a tagged result. */
export type PageFetcher = (url: string) => Promise<FetchResult>;

export function defaultHeaders(): Record<string, string> {
  const ua = USER_AGENTS[Math.floor(Math.random() * USER_AGENTS.length)];
  return {
    'user-agent': ua,
    'accept': 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
    'accept-language': 'en-US,en;q=0.9',
    'cache-control': 'no-cache',
    'upgrade-insecure-requests': '1',
  };
}

/**
 * GET a page and return its HTML, or a tagged error describing why it could
 * not be read. Redirects are followed; the timeout covers headers and body.
 *
 * @example
 * const page = await fetchPage('https://acme.com', { timeoutMs: 5000 });
 * if (!page.ok) console.log(page.error.kind); // 'timeout' | 'dns' | 'http' | ...
 */
export async function fetchPage(url: string, opts: FetchOptions = {}): Promise<FetchResult> {
  const timeoutMs = opts.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  if (opts.signal?.aborted) {
    return { ok: false, url, error: { kind: 'aborted', message: 'aborted before start' } };
  }
  const controller = new AbortController();
  let timedOut = false;
  const tId = setTimeout(() => {
    timedOut = true;
    controller.abort();
  }, timeoutMs);
  const onAbort = () => controller.abort();
  opts.signal?.addEventListener('abort', onAbort, { once: true });

  try {
    const res = await undiciFetch(url, {
      method: 'GET',
      headers: defaultHeaders(),
      redirect: 'follow',
      signal: controller.signal,
      dispatcher: opts.dispatcher,
    });
    const finalUrl = res.url || url;
    if (!res.ok) {
      debug('fetch', `GET ${url} -> ${res.status} ${res.statusText}`);
      return {
        ok: false,
        url,
        error: { kind: 'http', status: res.status, message: `HTTP ${res.status}${res.statusText ? ` ${res.statusText}` : ''}` },
      };
    }
    const ct = res.headers.get('content-type') || '';
    if (ct && !/text\/html|application\/xhtml\+xml/i.test(ct)) {
      debug('fetch', `GET ${url} -> content-type ${ct}, skipping`);
      return { ok: false, url, error: { kind: 'not_html', status: res.status, message: `unexpected content-type ${ct}` } };
    }
    const html = await res.text();
    debug('fetch', `GET ${url} -> ${res.status} len=${html.length}`);
    return { ok: true, url, finalUrl, status: res.status, html };
  } catch (err) {
    const error = classifyFetchError(err, timedOut, timeoutMs);
    debug('fetch', `ERR ${url} -> ${error.kind}: ${error.message}`);
    return { ok: false, url, error };
  } finally {
    clearTimeout(tId);
    opts.signal?.removeEventListener('abort', onAbort);
  }
}

/** Bind fetch options once; the returned fetcher is what the inspector uses. */
export function createFetcher(defaults: FetchOptions = {}): PageFetcher {
  return (url) => fetchPage(url, defaults);
}

/**
 * Map an undici/Node error to a fetch error kind. undici wraps socket errors
 * as `TypeError('fetch failed')` with the system error in `cause`.
 */
export function classifyFetchError(err: unknown, timedOut = false, timeoutMs = DEFAULT_TIMEOUT_MS): FetchError {
  if (timedOut) return { kind: 'timeout', message: `timed out after ${timeoutMs}ms` };
  const code = errorCode(err);
  const message = deepestMessage(err);
  if (!code && err instanceof Error && err.name === 'AbortError') return { kind: 'aborted', message: 'aborted' };
  switch (code) {
    case 'ENOTFOUND':
    case 'EAI_AGAIN':
      return { kind: 'dns', message };
    case 'ECONNREFUSED':
      return { kind: 'connection_refused', message };
    case 'ECONNRESET':
    case 'EPIPE':
    case 'UND_ERR_SOCKET':
      return { kind: 'connection_reset', message };
    case 'ETIMEDOUT':
    case 'UND_ERR_CONNECT_TIMEOUT':
    case 'UND_ERR_HEADERS_TIMEOUT':
    case 'UND_ERR_BODY_TIMEOUT':
      return { kind: 'timeout', message };
  }
  if (code && /^(ERR_TLS|ERR_SSL|CERT_|UNABLE_TO_|DEPTH_ZERO|SELF_SIGNED)/.test(code)) return { kind: 'tls', message };
  return { kind: 'network', message };
}

function errorCode(err: unknown): string | undefined {
  for (let e: unknown = err, depth = 0; e && depth < 5; depth++) {
    if (typeof e !== 'object') return undefined;
    if ('code' in e && typeof e.code === 'string') return e.code;
    e = 'cause' in e ? e.cause : undefined;
  }
  return undefined;
}

function deepestMessage(err: unknown): string {
  let msg = err instanceof Error ? err.message : String(err);
  for (let e: unknown = err, depth = 0; e instanceof Error && depth < 5; depth++) {
    if (e.message) msg = e.message;
    e = e.cause;
  }
  return msg.slice(0, 200);
}

/**
 * Route every request through HTTPS_PROXY/HTTP_PROXY, or disable TLS
 * verification when INSECURE_TLS=1. Call once at process start.
 */
export function configureHttp(env: NodeJS.ProcessEnv = process.env) {
  const proxy = env.HTTPS_PROXY || env.HTTP_PROXY;
  if (proxy) {
    setGlobalDispatcher(new ProxyAgent(proxy));
    debug('fetch', `Using proxy: ${proxy}`);
  } else if (env.INSECURE_TLS === '1') {
    setGlobalDispatcher(new Agent({ connect: { rejectUnauthorized: false } }));
    debug('fetch', 'Using insecure TLS (rejectUnauthorized=false)');
  }
}
