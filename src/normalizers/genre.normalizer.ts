import { RawValue } from '../interfaces/raw-record.interface';
import { cleanText, toRawText } from './text.normalizer';

const GENRE_SEPARATORS = /[,;|]/;

/**
 * Capitalize the first letter of every word and lowercase the rest.
 * Any non-letter starts a new word, so "sci-fi" becomes "Sci-Fi".
 */
export function titleCase(text: string): string {
  return text
    .toLowerCase()
    .replace(/(^|[^\p{L}])(\p{L})/gu, (_match, boundary: string, letter: string) => boundary + letter.toUpperCase());
}

/**
 * Split a cleaned genre list into title-cased entries joined with ", ".
 * Entities are decoded before the split so "&amp;" stays one genre.
 */
export function extractGenres(value: RawValue): string | null {
  const entries: Array<string | null> = Array.isArray(value) ? value : [toRawText(value)];

  const genres = entries
    .map((entry) => cleanText(entry))
    .filter((entry): entry is string => entry !== null)
    .flatMap((entry) => entry.split(GENRE_SEPARATORS))
    .map((token) => cleanText(token))
    .filter((token): token is string => token !== null)
    .map(titleCase)
    .filter((genre) => genre.length > 1);

  return genres.length > 0 ? genres.join(', ') : null;
}
