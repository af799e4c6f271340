import { RawRecord, RawValue } from '../interfaces/raw-record.interface';
import { roundTo } from '../utils/numeric';
import { parseFirstNumber } from './number.normalizer';
import { cleanText } from './text.normalizer';

const CURRENCY_SYMBOLS = /[€$£¥]/g;

/** Columns holding the price actually charged, in priority order */
const CURRENT_PRICE_FIELDS = ['discounted_price', 'current_price', 'price'] as const;

/**
 * Parse a storefront price string.
 *
 * When both separators appear, the later one is the decimal point
 * ("1.234,56" and "1,234.56" are both 1234.56). A lone comma is a
 * decimal point. Anything mentioning "free" costs 0.
 */
export function normalizePrice(value: RawValue): number | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) && value >= 0 ? value : null;
  }

  const text = cleanText(value);
  if (text === null) {
    return null;
  }
  if (/free/i.test(text)) {
    return 0;
  }

  let amount = text.replace(CURRENCY_SYMBOLS, '').replace(/\s/g, '');
  const lastComma = amount.lastIndexOf(',');
  const lastDot = amount.lastIndexOf('.');

  if (lastComma !== -1 && lastDot !== -1) {
    amount =
      lastComma > lastDot
        ? amount.replace(/\./g, '').replace(/,/g, '.')
        : amount.replace(/,/g, '');
  } else if (lastComma !== -1) {
    amount = amount.replace(/,/g, '.');
  }

  const match = amount.match(/\d+(?:\.\d+)?/);
  return match ? parseFloat(match[0]) : null;
}

/**
 * Discounts arrive as "-75%", "75%" or 75. The sign is dropped.
 */
export function normalizeDiscountPercentage(value: RawValue): number | null {
  const discount = parseFirstNumber(value);
  if (discount === null) {
    return null;
  }
  const percentage = Math.abs(discount);
  return percentage <= 100 ? percentage : null;
}

/**
 * Resolve the price a buyer pays.
 *
 * An explicit current price wins. Otherwise a positive discount is applied
 * to the original price; without one the original price stands.
 */
export function resolveDiscountedPrice(record: RawRecord): number | null {
  for (const field of CURRENT_PRICE_FIELDS) {
    const explicit = normalizePrice(record[field]);
    if (explicit !== null) {
      return explicit;
    }
  }

  const original = normalizePrice(record['original_price']);
  if (original === null) {
    return null;
  }

  const discount = normalizeDiscountPercentage(record['discount_percentage']);
  if (discount !== null && discount > 0) {
    return roundTo(original * (1 - discount / 100), 2);
  }
  return original;
}

/**
 * Derive the discount from the two resolved prices when both are known.
 * A discounted price above the original yields 0.
 */
export function recomputeDiscountPercentage(
  originalPrice: number | null,
  discountedPrice: number | null,
  fallback: number | null,
): number | null {
  if (originalPrice === null || discountedPrice === null) {
    return fallback;
  }
  if (originalPrice <= 0 || discountedPrice <= 0) {
    return fallback;
  }
  const percentage = roundTo(((originalPrice - discountedPrice) / originalPrice) * 100, 2);
  return Math.max(0, percentage);
}
