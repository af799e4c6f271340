import { ReleaseStatus } from '../interfaces/canonical-record.interface';
import { RawValue } from '../interfaces/raw-record.interface';
import { cleanText } from './text.normalizer';

const MONTH_NAMES = [
  'january',
  'february',
  'march',
  'april',
  'may',
  'june',
  'july',
  'august',
  'september',
  'october',
  'november',
  'december',
];

interface DateParts {
  year: number;
  month: number;
  day: number;
}

interface DateFormat {
  name: string;
  pattern: RegExp;
  toParts(match: RegExpMatchArray): DateParts | null;
}

function fullMonth(name: string): number | null {
  const index = MONTH_NAMES.indexOf(name.toLowerCase());
  return index === -1 ? null : index + 1;
}

function shortMonth(name: string): number | null {
  const index = MONTH_NAMES.findIndex((month) => month.slice(0, 3) === name.toLowerCase());
  return index === -1 ? null : index + 1;
}

function parts(year: number, month: number | null, day: number): DateParts | null {
  return month === null ? null : { year, month, day };
}

/** Two-digit years: 00-68 are 20xx, 69-99 are 19xx */
function expandYear(year: number): number {
  return year <= 68 ? 2000 + year : 1900 + year;
}

/**
 * Formats tried in order; the first one that yields a real calendar date wins
 */
const DATE_FORMATS: readonly DateFormat[] = [
  {
    name: 'YYYY-MM-DD',
    pattern: /^(\d{4})-(\d{1,2})-(\d{1,2})$/,
    toParts: (m) => parts(Number(m[1]), Number(m[2]), Number(m[3])),
  },
  {
    name: 'DD-Mon-YY',
    pattern: /^(\d{1,2})-([A-Za-z]{3})-(\d{2})$/,
    toParts: (m) => parts(expandYear(Number(m[3])), shortMonth(m[2]), Number(m[1])),
  },
  {
    name: 'Month DD, YYYY',
    pattern: /^([A-Za-z]+) (\d{1,2}), (\d{4})$/,
    toParts: (m) => parts(Number(m[3]), fullMonth(m[1]), Number(m[2])),
  },
  {
    name: 'DD Mon, YYYY',
    pattern: /^(\d{1,2}) ([A-Za-z]{3}), (\d{4})$/,
    toParts: (m) => parts(Number(m[3]), shortMonth(m[2]), Number(m[1])),
  },
  {
    name: 'Mon DD, YYYY',
    pattern: /^([A-Za-z]{3}) (\d{1,2}), (\d{4})$/,
    toParts: (m) => parts(Number(m[3]), shortMonth(m[1]), Number(m[2])),
  },
  {
    name: 'DD-MM-YYYY',
    pattern: /^(\d{1,2})-(\d{1,2})-(\d{4})$/,
    toParts: (m) => parts(Number(m[3]), Number(m[2]), Number(m[1])),
  },
  {
    name: 'YYYY',
    pattern: /^(\d{4})$/,
    toParts: (m) => parts(Number(m[1]), 1, 1),
  },
];

function isCalendarDate({ year, month, day }: DateParts): boolean {
  const date = new Date(Date.UTC(year, month - 1, day));
  return (
    date.getUTCFullYear() === year && date.getUTCMonth() === month - 1 && date.getUTCDate() === day
  );
}

function formatParts({ year, month, day }: DateParts): string {
  return [
    String(year).padStart(4, '0'),
    String(month).padStart(2, '0'),
    String(day).padStart(2, '0'),
  ].join('-');
}

/**
 * Format a Date as YYYY-MM-DD in UTC
 */
export function toIsoDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

/**
 * Parse a storefront release date into YYYY-MM-DD
 */
export function normalizeDate(value: RawValue): string | null {
  const text = cleanText(value);
  if (text === null) {
    return null;
  }

  for (const format of DATE_FORMATS) {
    const match = text.match(format.pattern);
    if (!match) {
      continue;
    }
    const dateParts = format.toParts(match);
    if (dateParts && isCalendarDate(dateParts)) {
      return formatParts(dateParts);
    }
  }

  return null;
}

/**
 * Release status from the date, unless the storefront supplied one
 */
export function deriveReleaseStatus(
  releaseDate: string | null,
  providedStatus: RawValue,
  referenceDate: Date,
): ReleaseStatus | string {
  const provided = cleanText(providedStatus);
  if (provided !== null) {
    return provided;
  }
  if (releaseDate === null) {
    return 'Unknown';
  }
  return releaseDate <= toIsoDate(referenceDate) ? 'Released' : 'Upcoming';
}
