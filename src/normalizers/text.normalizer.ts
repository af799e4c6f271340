import { RawValue } from '../interfaces/raw-record.interface';

/** Placeholders scrapers and spreadsheet exports write for "no value" */
const NULL_SENTINEL = /^(n\/?a|nan)$/i;

/**
 * UTF-8 text that was decoded as Windows-1252 somewhere upstream.
 * Order matters: the longer sequences must go before the bare "Â".
 */
const MOJIBAKE_REPLACEMENTS: ReadonlyArray<[string, string]> = [
  ['â€™', "'"],
  ['â€˜', "'"],
  ['â€œ', '"'],
  ['â€\u009d', '"'],
  ['â€“', '–'],
  ['â€”', '—'],
  ['â„¢', '™'],
  ['Â®', '®'],
  ['Â©', '©'],
  ['Â\u00a0', ' '],
  ['Â ', ' '],
  ['Â', ''],
];

const HTML_ENTITIES: ReadonlyArray<[RegExp, string]> = [
  [/&nbsp;/gi, ' '],
  [/&lt;/gi, '<'],
  [/&gt;/gi, '>'],
  [/&quot;/gi, '"'],
  [/&(#39|apos);/gi, "'"],
  // last, so "&amp;lt;" decodes once
  [/&amp;/gi, '&'],
];

const CONTROL_CHARS = /[\u0000-\u0008\u000b\u000c\u000e-\u001f\u007f]/g;
const NON_BREAKING_SPACES = /[\u00a0\u2007\u202f]/g;
const ZERO_WIDTH_CHARS = /[\u200b-\u200d\u2060\ufeff]/g;

/**
 * Render a raw value as text without cleaning it.
 * Lists are joined with ", ".
 */
export function toRawText(value: RawValue): string | null {
  if (value === null || value === undefined) {
    return null;
  }
  if (Array.isArray(value)) {
    return value.join(', ');
  }
  if (typeof value === 'number') {
    return Number.isFinite(value) ? String(value) : null;
  }
  return String(value);
}

/**
 * Check whether text is one of the "no value" placeholders
 */
export function isNullSentinel(text: string): boolean {
  return text.trim() === '' || NULL_SENTINEL.test(text.trim());
}

/**
 * Repair mojibake, decode HTML entities, drop invisible characters and
 * collapse whitespace. Empty or placeholder values become null.
 */
export function cleanText(value: RawValue): string | null {
  const raw = toRawText(value);
  if (raw === null) {
    return null;
  }

  let text = raw.normalize('NFC');
  for (const [broken, fixed] of MOJIBAKE_REPLACEMENTS) {
    text = text.split(broken).join(fixed);
  }
  text = text.replace(CONTROL_CHARS, '');
  for (const [entity, decoded] of HTML_ENTITIES) {
    text = text.replace(entity, decoded);
  }
  text = text
    .replace(NON_BREAKING_SPACES, ' ')
    .replace(ZERO_WIDTH_CHARS, '')
    .replace(/\s+/g, ' ')
    .trim();

  return isNullSentinel(text) ? null : text;
}

/**
 * Clean text and cut it to at most `maxLength` UTF-16 units.
 * The cut never splits a surrogate pair.
 */
export function truncateText(value: RawValue, maxLength: number): string | null {
  const text = cleanText(value);
  if (text === null || text.length <= maxLength) {
    return text;
  }
  let end = maxLength;
  if (end > 0 && isHighSurrogate(text.charCodeAt(end - 1))) {
    end--;
  }
  return text.slice(0, end).trimEnd();
}

function isHighSurrogate(code: number): boolean {
  return code >= 0xd800 && code <= 0xdbff;
}
