import { CanonicalRecord } from '../interfaces/canonical-record.interface';
import { DataSource } from '../interfaces/data-source.interface';
import { PipelineOptions } from '../interfaces/pipeline-options.interface';
import { RawRecord, SourceBatch } from '../interfaces/raw-record.interface';
import { MISSING_RATING } from '../utils/rating';

/**
 * Test fixtures for raw storefront records, keyed by the batch label
 * each would arrive under
 */
export const mockRawRecords: Record<string, RawRecord> = {
  steam: {
    title: 'Portal 2',
    rating_score: 95,
    review_count: '12,345',
    original_price: '$9.99',
    discounted_price: '$1.99',
    discount_percentage: '-80%',
    release_date: 'Apr 18, 2011',
    genres: 'puzzle; action',
    platforms: 'Windows, macOS, SteamOS + Linux',
    developer: 'Test Dev Studio',
    publisher: 'Test Publisher',
    description: 'A puzzle game&nbsp;with portals &amp; cake.',
    url: 'https://store.example.com/app/620',
    user_tags: 'Co-op, Puzzle',
  },
  steamSummaryOnly: {
    title: 'Summary Game',
    review_summary: 'Mostly Positive',
    url: 'https://store.example.com/app/1',
  },
  gog: {
    title: 'portal 2 ',
    rating: 4.0,
    url: 'https://gog.example.com/game/portal_2',
  },
  gogStars: {
    title: 'Star Game',
    rating: '4.5/5',
    price: '€ 14,99',
    url: 'https://gog.example.com/game/star_game',
  },
  instantGaming: {
    title: 'Instant Title',
    ig_rating: '8.5',
    genre: 'RPG|open world',
    current_price: '29,99€',
    original_price: '59,99€',
    url: 'https://ig.example.com/en/1-instant-title',
  },
  missingTitle: {
    title: 'N/A',
    rating_score: 50,
    url: 'https://store.example.com/app/2',
  },
};

/**
 * Two exports of the same game as they arrive from Steam and GOG
 */
export const portalBatches: SourceBatch[] = [
  { source: 'Steam', records: [{ title: 'Portal 2', rating_score: 95 }] },
  { source: 'GOG', records: [{ title: 'portal 2 ', rating: 4.0 }] },
];

/**
 * Pipeline options with every business rule switched off
 */
export const noRuleOptions: PipelineOptions = {
  platformPolicy: 'canonical',
  descriptionMaxLength: 1000,
  referenceDate: new Date('2025-06-01T00:00:00.000Z'),
  extraFields: ['user_tags', 'game_features', 'editions'],
  enabledRules: [],
};

/**
 * Unified record with every field null, for building test cases
 */
export function createCanonicalRecord(overrides: Partial<CanonicalRecord> = {}): CanonicalRecord {
  return {
    dataSource: DataSource.STEAM,
    gameTitle: 'Test Game',
    releaseDate: null,
    rating: MISSING_RATING,
    reviewCount: null,
    originalPrice: null,
    discountedPrice: null,
    discountPercentage: null,
    genres: null,
    platform: null,
    developer: null,
    publisher: null,
    description: null,
    gameUrl: null,
    releaseStatus: null,
    extras: {},
    ...overrides,
  };
}
