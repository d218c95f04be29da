import { describe, it, expect } from 'vitest';
import { MAX_DESCRIPTION_LENGTH, extractMetaDescription, hasDescription } from '../src/scraper/meta.js';

describe('extractMetaDescription', () => {
  it('prefers the description meta over og:description', () => {
    const html = '<head><meta property="og:description" content="og"><meta name="description" content="plain"></head>';
    expect(extractMetaDescription(html)).toBe('plain');
  });

  it('skips an empty description meta', () => {
    const html = '<head><meta name="description" content="  "><meta property="og:description" content="og text"></head>';
    expect(extractMetaDescription(html)).toBe('og text');
  });

  it('cuts long descriptions', () => {
    const html = `<meta name="description" content="${'x'.repeat(400)}">`;
    expect(extractMetaDescription(html)).toHaveLength(MAX_DESCRIPTION_LENGTH);
  });

  it('returns undefined without a description', () => {
    expect(extractMetaDescription('<html><body>hi</body></html>')).toBeUndefined();
  });
});

describe('hasDescription', () => {
  it('looks at the known description columns', () => {
    expect(hasDescription({ 'Company Description': 'Insurer' })).toBe(true);
    expect(hasDescription({ description: '   ', notes: 'x' })).toBe(false);
  });
});
