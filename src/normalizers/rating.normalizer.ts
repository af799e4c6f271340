import { getRatingScale } from '../config/source-field-maps.config';
import { DataSource } from '../interfaces/data-source.interface';
import { RawValue } from '../interfaces/raw-record.interface';
import { roundTo } from '../utils/numeric';
import { parseFirstNumber } from './number.normalizer';
import { cleanText } from './text.normalizer';

/**
 * Steam review summaries and the score each one stands for.
 * Longest phrases first so "mostly positive" is not read as "positive".
 */
const STEAM_REVIEW_SCORES: ReadonlyArray<[string, number]> = [
  ['overwhelmingly positive', 95],
  ['overwhelmingly negative', 5],
  ['mostly positive', 70],
  ['mostly negative', 30],
  ['very positive', 85],
  ['very negative', 15],
  ['positive', 75],
  ['negative', 25],
  ['mixed', 50],
];

/**
 * Convert a source rating to the 0-100 scale, rounded to one decimal.
 * Values outside the source's published range are rejected.
 */
export function normalizeRating(value: RawValue, source: DataSource): number | null {
  const rating = parseFirstNumber(value);
  if (rating === null) {
    return null;
  }

  const scale = getRatingScale(source);
  if (rating < 0 || rating > scale.max) {
    return null;
  }

  return roundTo(rating * scale.factor, 1);
}

/**
 * Score for a Steam review summary such as "Very Positive"
 */
export function steamReviewSummaryToScore(value: RawValue): number | null {
  const summary = cleanText(value)?.toLowerCase();
  if (!summary) {
    return null;
  }
  const entry = STEAM_REVIEW_SCORES.find(([phrase]) => summary.includes(phrase));
  return entry ? entry[1] : null;
}
