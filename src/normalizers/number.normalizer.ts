import { RawValue } from '../interfaces/raw-record.interface';
import { cleanText } from './text.normalizer';

const FIRST_NUMBER = /-?\d+(?:[.,]\d+)?/;

/**
 * First signed number in a value. "4,5/5" reads as 4.5.
 */
export function parseFirstNumber(value: RawValue): number | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }
  const text = cleanText(value);
  if (text === null) {
    return null;
  }
  const match = text.match(FIRST_NUMBER);
  return match ? parseFloat(match[0].replace(',', '.')) : null;
}

/**
 * Review counts arrive as "12,345", "12,345 reviews" or plain numbers
 */
export function normalizeReviewCount(value: RawValue): number | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) && value >= 0 ? Math.trunc(value) : null;
  }
  const text = cleanText(value);
  if (text === null) {
    return null;
  }
  const match = text.replace(/,/g, '').match(/\d+/);
  return match ? parseInt(match[0], 10) : null;
}
