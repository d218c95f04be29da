import * as cheerio from 'cheerio';
import type { Element } from 'domhandler';
import { findPhoneNumbersInText, type CountryCode } from 'libphonenumber-js/max';
import type { Detection, FieldMatch } from '../types.js';
import { debug } from '../utils/log.js';

/** Matched anywhere inside an attribute value. */
export const SUBSTRING_KEYWORDS = ['phone', 'mobile', 'telephone', 'contact_number', 'contact-number', 'contactnumber'];

/** Too short to match as substrings ("hotel", "excellent"); must be a whole token. */
export const TOKEN_KEYWORDS = ['tel', 'cell', 'sms'];

/** Removed before substring matching. */
export const EXCLUDED_TERMS = [
  'microphone', 'headphone', 'earphone', 'iphone', 'smartphone', 'megaphone', 'saxophone', 'xylophone', 'automobile',
];

export const LABEL_PHRASES = [
  'phone', 'mobile', 'telephone', 'cell number', 'contact number', 'best number', 'call me', 'call us', 'text me',
];

const NON_CAPTURE_TYPES = new Set(['hidden', 'submit', 'button', 'reset', 'image', 'checkbox', 'radio', 'file', 'password']);

const ATTRIBUTES = ['name', 'id', 'placeholder', 'autocomplete', 'aria-label'] as const;

export interface DetectOptions {
  /** Region used to read phone-number placeholders (default: US). */
  defaultCountry?: CountryCode;
}

/**
 * Decide whether a page has a phone-capture field. Rules run in order and
 * the first hit wins:
 *
 * 1. `input[type=tel]`
 * 2. a text input whose name, id, placeholder, autocomplete or aria-label
 *    carries a phone keyword, or whose placeholder is itself a phone number
 * 3. a label with a phone phrase attached to a text input
 *
 * Unparseable markup counts as no match.
 */
export function detectPhoneField(html: string, opts: DetectOptions = {}): Detection {
  let $: cheerio.CheerioAPI;
  try {
    $ = cheerio.load(html || '');
  } catch (e) {
    debug('detect', `unparseable html: ${e instanceof Error ? e.message : String(e)}`);
    return { found: false };
  }
  const match = telInput($) ?? keywordAttribute($, opts.defaultCountry ?? 'US') ?? keywordLabel($);
  return match ? { found: true, match } : { found: false };
}

function telInput($: cheerio.CheerioAPI): FieldMatch | undefined {
  const el = $('input').toArray().find((e) => inputType($, e) === 'tel');
  if (!el) return undefined;
  return { rule: 1, ruleName: 'tel-input', element: describe($, el), matchedOn: 'type=tel' };
}

function keywordAttribute($: cheerio.CheerioAPI, country: CountryCode): FieldMatch | undefined {
  for (const el of $('input').toArray()) {
    if (!isCaptureInput($, el)) continue;
    for (const attr of ATTRIBUTES) {
      const value = $(el).attr(attr);
      if (!value) continue;
      const keyword = matchPhoneKeyword(value);
      if (keyword) {
        return { rule: 2, ruleName: 'attribute-keyword', element: describe($, el), matchedOn: `${attr}:${keyword}` };
      }
    }
    const placeholder = $(el).attr('placeholder');
    if (placeholder && looksLikePhoneNumber(placeholder, country)) {
      return { rule: 2, ruleName: 'attribute-keyword', element: describe($, el), matchedOn: `placeholder:${placeholder.trim()}` };
    }
  }
  return undefined;
}

function keywordLabel($: cheerio.CheerioAPI): FieldMatch | undefined {
  for (const label of $('label').toArray()) {
    const text = $(label).text().replace(/\s+/g, ' ').trim();
    const phrase = matchLabelPhrase(text);
    if (!phrase) continue;
    const input = labelledInput($, label);
    if (input) return { rule: 3, ruleName: 'label-keyword', element: describe($, input), matchedOn: phrase };
  }
  return undefined;
}

/** The text input a label belongs to: `for` target, wrapped input, sibling input, or one inside the next element. */
function labelledInput($: cheerio.CheerioAPI, label: Element): Element | undefined {
  const $label = $(label);
  const forId = $label.attr('for');
  if (forId) {
    const target = $('input').toArray().find((e) => $(e).attr('id') === forId);
    if (target) return isCaptureInput($, target) ? target : undefined;
  }
  const pools = [$label.find('input').toArray(), $label.siblings('input').toArray(), $label.next().find('input').toArray()];
  for (const pool of pools) {
    const el = pool.find((e) => isCaptureInput($, e));
    if (el) return el;
  }
  return undefined;
}

/**
 * Return the phone keyword an attribute value carries, if any.
 *
 * @example
 * matchPhoneKeyword('phoneNumber'); // 'phone'
 * matchPhoneKeyword('user_tel');    // 'tel'
 * matchPhoneKeyword('telegram');    // undefined
 */
export function matchPhoneKeyword(value: string): string | undefined {
  const stripped = stripExcluded(value.toLowerCase());
  const sub = SUBSTRING_KEYWORDS.find((k) => stripped.includes(k));
  if (sub) return sub;
  const tokens = new Set(tokenize(value));
  return TOKEN_KEYWORDS.find((k) => tokens.has(k));
}

export function matchLabelPhrase(text: string): string | undefined {
  const stripped = stripExcluded(text.toLowerCase());
  const phrase = LABEL_PHRASES.find((p) => stripped.includes(p));
  if (phrase) return phrase;
  const tokens = new Set(tokenize(text));
  return TOKEN_KEYWORDS.find((k) => tokens.has(k));
}

/**
 * Placeholders such as "(212) 736-5000" or "+44 20 7946 0958". Only numbers
 * valid for their region count, so dates and ZIP+4 codes do not.
 */
export function looksLikePhoneNumber(text: string, country: CountryCode = 'US'): boolean {
  const t = text.trim();
  const digits = t.replace(/\D/g, '');
  if (digits.length < 7 || digits.length > 15) return false;
  return findPhoneNumbersInText(t, { defaultCountry: country }).length > 0;
}

function stripExcluded(lower: string) {
  return EXCLUDED_TERMS.reduce((s, term) => s.split(term).join(' '), lower);
}

/** Split on camelCase and on anything that is not a letter: `userTelNo` -> user, tel, no. */
function tokenize(value: string) {
  return value
    .replace(/([a-z])([A-Z])/g, '$1 $2')
    .toLowerCase()
    .split(/[^a-z]+/)
    .filter(Boolean);
}

function inputType($: cheerio.CheerioAPI, el: Element) {
  return ($(el).attr('type') || 'text').trim().toLowerCase();
}

function isCaptureInput($: cheerio.CheerioAPI, el: Element) {
  return !NON_CAPTURE_TYPES.has(inputType($, el));
}

function describe($: cheerio.CheerioAPI, el: Element) {
  const $el = $(el);
  for (const attr of ['name', 'id', 'placeholder'] as const) {
    const v = $el.attr(attr);
    if (v) return `input[${attr}="${v}"]`;
  }
  const type = $el.attr('type');
  return type ? `input[type="${type}"]` : 'input';
}
