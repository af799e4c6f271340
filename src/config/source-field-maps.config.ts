import { DataSource } from '../interfaces/data-source.interface';
import { RatingScale } from '../interfaces/source-mapper.interface';

/**
 * Raw column name -> canonical field name, per storefront.
 *
 * Canonical names used by the validator:
 * - game_title, game_url, release_date, rating_raw, review_count
 * - original_price, discounted_price, discount_percentage
 * - genres, platform, developer, publisher, description, release_status
 *
 * `current_price` and `price` are left alone: the discounted-price
 * calculator reads them directly when no `discounted_price` exists.
 */
export const SOURCE_FIELD_MAPS: Record<DataSource, Record<string, string>> = {
  [DataSource.STEAM]: {
    title: 'game_title',
    rating_score: 'rating_raw',
    url: 'game_url',
    platforms: 'platform',
  },
  [DataSource.GOG]: {
    title: 'game_title',
    rating: 'rating_raw',
    url: 'game_url',
    platforms: 'platform',
  },
  [DataSource.INSTANT_GAMING]: {
    title: 'game_title',
    ig_rating: 'rating_raw',
    url: 'game_url',
    platforms: 'platform',
    genre: 'genres',
  },
  [DataSource.RAWG]: {
    title: 'game_title',
    rating: 'rating_raw',
    url: 'game_url',
    platforms: 'platform',
  },
  [DataSource.METACRITIC]: {
    title: 'game_title',
    critic_score: 'rating_raw',
    url: 'game_url',
  },
  [DataSource.HUMBLE]: {
    title: 'game_title',
    url: 'game_url',
    platforms: 'platform',
  },
  [DataSource.EPIC]: {
    title: 'game_title',
    rating: 'rating_raw',
    url: 'game_url',
    platforms: 'platform',
    release_date_detailed: 'release_date',
    features: 'game_features',
  },
};

/**
 * Rating scale per storefront.
 *
 * - 0-100 sources pass through
 * - star ratings (0-5) are multiplied by 20
 * - Instant Gaming's 0-10 score is multiplied by 10
 */
export const RATING_SCALES: Record<DataSource, RatingScale> = {
  [DataSource.STEAM]: { max: 100, factor: 1 },
  [DataSource.GOG]: { max: 5, factor: 20 },
  [DataSource.INSTANT_GAMING]: { max: 10, factor: 10 },
  [DataSource.RAWG]: { max: 5, factor: 20 },
  [DataSource.METACRITIC]: { max: 100, factor: 1 },
  [DataSource.HUMBLE]: { max: 100, factor: 1 },
  [DataSource.EPIC]: { max: 5, factor: 20 },
};

/**
 * Get the rating scale for a source
 */
export function getRatingScale(source: DataSource): RatingScale {
  return RATING_SCALES[source];
}

/** Source-only fields kept by the schema unifier unless configured otherwise */
export const DEFAULT_EXTRA_FIELDS: readonly string[] = ['user_tags', 'game_features', 'editions'];
