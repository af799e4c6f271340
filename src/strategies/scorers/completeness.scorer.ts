import { Injectable } from '@nestjs/common';
import { CanonicalRecord } from '../../interfaces/canonical-record.interface';
import { IRecordScorer } from '../../interfaces/record-scorer.interface';

/** Bonus for a rating that is an actual number rather than a placeholder */
export const NUMERIC_RATING_BONUS = 2;

/**
 * Completeness Scorer
 *
 * Scores a record by how much of its descriptive metadata is filled:
 *
 * score = count of non-null { rating, release date, developer, publisher,
 *         genres, description } + 2 if the rating is numeric
 *
 * The maximum is 8.
 */
@Injectable()
export class CompletenessScorer implements IRecordScorer {
  readonly name = 'completeness';

  score(record: CanonicalRecord): number {
    const filled = [
      record.rating.kind !== 'missing',
      record.releaseDate !== null,
      record.developer !== null,
      record.publisher !== null,
      record.genres !== null,
      record.description !== null,
    ].filter(Boolean).length;

    return filled + (record.rating.kind === 'numeric' ? NUMERIC_RATING_BONUS : 0);
  }
}
