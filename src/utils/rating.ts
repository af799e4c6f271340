import { Rating, UNRATED_LABEL } from '../interfaces/canonical-record.interface';

export const MISSING_RATING: Rating = { kind: 'missing' };
export const UNRATED: Rating = { kind: 'unrated' };

export function numericRating(value: number | null): Rating {
  return value === null ? MISSING_RATING : { kind: 'numeric', value };
}

/**
 * Numeric value of a rating, or null for unrated and missing
 */
export function ratingValue(rating: Rating): number | null {
  return rating.kind === 'numeric' ? rating.value : null;
}

/**
 * Column value written for a rating: number, "Not yet rated" or null
 */
export function exportRating(rating: Rating): number | string | null {
  switch (rating.kind) {
    case 'numeric':
      return rating.value;
    case 'unrated':
      return UNRATED_LABEL;
    case 'missing':
      return null;
  }
}
