const HOST_LABEL = /^[a-z0-9](?:[a-z0-9-]*[a-z0-9])?$/;

/**
 * Repair the scheme typos common in hand-maintained lists:
 * `https://https//example.com`, `https//example.com`, `http//example.com`.
 */
export function preSanitizeUrl(u: string) {
  let s = (u || '').trim();
  if (/^https?:\/\/https?:\/\//i.test(s)) {
    s = 'https://' + s.replace(/^https?:\/\/https?:\/\//i, '');
  }
  s = s.replace(/:\/\/https\/\//i, '://');
  s = s.replace(/:\/\/http\/\//i, '://');
  s = s.replace(/^https\/\//i, 'https://');
  s = s.replace(/^http\/\//i, 'http://');
  return s;
}

/**
 * Normalize a website value to an absolute homepage URL.
 *
 * Defaults to https, drops query, hash and trailing slash, and keeps a
 * non-root path (`lemonade.com/pet` stays a sub-site).
 *
 * @returns The homepage, e.g. `https://example.com`, or undefined when the value is not a usable website.
 */
export function normalizeWebsite(raw: string): string | undefined {
  const fixed = preSanitizeUrl(raw);
  if (!fixed || /\s/.test(fixed)) return undefined;
  let url: URL;
  try {
    url = new URL(/^[a-z][a-z0-9+.-]*:\/\//i.test(fixed) ? fixed : `https://${fixed}`);
  } catch {
    return undefined;
  }
  if (url.protocol !== 'http:' && url.protocol !== 'https:') return undefined;
  if (!isPublicHostname(url.hostname)) return undefined;
  const pathname = url.pathname.replace(/\/+$/, '');
  return `${url.protocol}//${url.host}${pathname}`;
}

function isPublicHostname(host: string) {
  const labels = host.toLowerCase().split('.');
  if (labels.length < 2) return false;
  if (!labels.every((l) => HOST_LABEL.test(l))) return false;
  // a purely numeric TLD means an IP address
  return /[a-z]/.test(labels[labels.length - 1]);
}

/** `https://www.Acme.com/about` -> `acme.com`. */
export function bareHost(u: string) {
  return preSanitizeUrl(u)
    .trim()
    .replace(/^(https?:\/\/)?(www\.)?/i, '')
    .split(/[/?#]/)[0]
    .trim()
    .toLowerCase();
}
