import { DataSource } from '../interfaces/data-source.interface';
import { RawRecord } from '../interfaces/raw-record.interface';
import { steamReviewSummaryToScore } from '../normalizers/rating.normalizer';
import { BaseSourceMapper } from './base.mapper';

/**
 * Mapper for Steam store exports.
 *
 * Handles quirks:
 * - `rating_score` is already on the 0-100 scale
 * - older exports only carry the text `review_summary` ("Very Positive")
 */
export class SteamMapper extends BaseSourceMapper {
  readonly name = 'SteamMapper';
  readonly source = DataSource.STEAM;

  protected readonly sourceIdentifiers = ['steam', 'steam_store'];

  protected deriveFields(record: RawRecord): RawRecord {
    if (!this.isEmpty(record['rating_raw'])) {
      return record;
    }
    const score = steamReviewSummaryToScore(record['review_summary']);
    return score === null ? record : { ...record, rating_raw: score };
  }
}
