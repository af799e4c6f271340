import { DataSource } from './data-source.interface';
import { RawRecord } from './raw-record.interface';

/** Literal written in place of a rating for games nobody has reviewed yet */
export const UNRATED_LABEL = 'Not yet rated';

/**
 * Rating on the common 0-100 scale, or one of the two reasons it has none.
 */
export type Rating =
  | { kind: 'numeric'; value: number }
  | { kind: 'unrated' }
  | { kind: 'missing' };

export type ReleaseStatus = 'Released' | 'Upcoming' | 'Unknown';

/**
 * Fixed field set every record exposes once the schema is unified.
 */
export interface CanonicalFields {
  /** Provenance tag, never changed after mapping */
  dataSource: DataSource;

  /** Display title, non-empty */
  gameTitle: string;

  /** ISO 8601 calendar date (YYYY-MM-DD) */
  releaseDate: string | null;

  rating: Rating;

  reviewCount: number | null;

  /** Amounts stay in the storefront's currency */
  originalPrice: number | null;
  discountedPrice: number | null;

  /** Percentage in [0, 100] */
  discountPercentage: number | null;

  /** Title-cased genres joined with ", " */
  genres: string | null;

  platform: string | null;
  developer: string | null;
  publisher: string | null;
  description: string | null;

  /** Storefront URL, unique within one source */
  gameUrl: string | null;

  /** Derived status, or the tag the storefront supplied */
  releaseStatus: ReleaseStatus | string | null;
}

/**
 * A cleaned record before schema unification. Fields the source never
 * provided may be absent; source-only fields ride along in `extras`.
 */
export type CleanedRecord = Pick<CanonicalFields, 'dataSource' | 'gameTitle'> &
  Partial<Omit<CanonicalFields, 'dataSource' | 'gameTitle'>> & {
    extras: RawRecord;
  };

/**
 * The unified entity flowing through merge, dedup and business rules.
 */
export interface CanonicalRecord extends CanonicalFields {
  /** Allow-listed source-only fields, e.g. user_tags */
  extras: RawRecord;
}

/**
 * Row shape handed to writers and the relational loader.
 */
export interface CanonicalRow {
  data_source: string;
  game_title: string;
  release_date: string | null;
  rating: number | string | null;
  review_count: number | null;
  original_price: number | null;
  discounted_price: number | null;
  discount_percentage: number | null;
  genres: string | null;
  platform: string | null;
  developer: string | null;
  publisher: string | null;
  description: string | null;
  game_url: string | null;
  release_status: string | null;
}

/** Output column order */
export const CANONICAL_COLUMNS: readonly (keyof CanonicalRow)[] = [
  'data_source',
  'game_title',
  'release_date',
  'rating',
  'review_count',
  'original_price',
  'discounted_price',
  'discount_percentage',
  'genres',
  'platform',
  'developer',
  'publisher',
  'description',
  'game_url',
  'release_status',
];
