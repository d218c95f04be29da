/**
 * Scoped debug output, silent unless DEBUG_SCRAPE is set.
 *
 * @example
 * debug('fetch', `GET ${url} -> 200`); // [fetch] GET https://acme.com -> 200
 */
export function debug(scope: string, msg: string) {
  if (process.env.DEBUG_SCRAPE) {
    console.log(`[${scope}] ${msg}`);
  }
}

export function warn(scope: string, msg: string) {
  console.warn(`[${scope}] ${msg}`);
}
