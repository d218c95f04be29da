import * as cheerio from 'cheerio';

export const MAX_DESCRIPTION_LENGTH = 300;

/** Input columns that already carry a company description. */
export const DESCRIPTION_COLUMNS = ['description', 'Description', 'Company Description', 'Short Description', 'About'];

/**
 * The page's `<meta name="description">`, else its `og:description`,
 * whitespace-collapsed and cut to 300 characters.
 */
export function extractMetaDescription(html: string): string | undefined {
  const $ = cheerio.load(html);
  for (const selector of ['meta[name="description"]', 'meta[property="og:description"]']) {
    const content = ($(selector).first().attr('content') ?? '').replace(/\s+/g, ' ').trim();
    if (content) return content.slice(0, MAX_DESCRIPTION_LENGTH);
  }
  return undefined;
}

export function hasDescription(row: Readonly<Record<string, string>>) {
  return DESCRIPTION_COLUMNS.some((c) => (row[c] ?? '').trim() !== '');
}
