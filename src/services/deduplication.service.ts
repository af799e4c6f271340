import { Injectable, Logger } from '@nestjs/common';
import { CanonicalRecord } from '../interfaces/canonical-record.interface';
import { CompletenessScorer } from '../strategies/scorers/completeness.scorer';
import { ratingValue } from '../utils/rating';

export interface DeduplicationResult {
  records: CanonicalRecord[];

  /** Distinct normalized titles */
  groups: number;

  /** Groups that held more than one record */
  duplicateGroups: number;

  /** Records removed because another copy won */
  duplicatesRemoved: number;
}

interface Candidate {
  record: CanonicalRecord;
  score: number;
  size: number;
}

/**
 * Key under which records of the same game meet: lower-cased with
 * whitespace trimmed and collapsed. Punctuation is kept, so "Doom" and
 * "DOOM " meet but "Doom" and "Doom!" do not.
 */
export function titleKey(title: string): string {
  return title.toLowerCase().replace(/\s+/g, ' ').trim();
}

/**
 * Deduplication Service
 *
 * Collapses records sharing a title key into the single best one. The
 * winner is picked by quality score, then by the higher numeric rating,
 * then by arrival order. Fields are never combined across duplicates.
 *
 * Two different games with the same title collapse as well; that loss is
 * accepted.
 */
@Injectable()
export class DeduplicationService {
  private readonly logger = new Logger(DeduplicationService.name);

  constructor(private readonly scorer: CompletenessScorer) {}

  resolve(records: CanonicalRecord[]): DeduplicationResult {
    const groups = new Map<string, Candidate>();

    for (const record of records) {
      const key = titleKey(record.gameTitle);
      const score = this.scorer.score(record);
      const current = groups.get(key);

      if (!current) {
        groups.set(key, { record, score, size: 1 });
        continue;
      }

      current.size++;
      if (this.beats(record, score, current)) {
        this.logger.debug(
          `"${record.gameTitle}" from ${record.dataSource} (score ${score}) replaces ` +
            `${current.record.dataSource} (score ${current.score})`,
        );
        current.record = record;
        current.score = score;
      }
    }

    const winners = Array.from(groups.values());
    const duplicatesRemoved = records.length - winners.length;
    const duplicateGroups = winners.filter((candidate) => candidate.size > 1).length;

    this.logger.log(
      `Deduplicated ${records.length} records into ${winners.length} ` +
        `(${duplicatesRemoved} duplicates across ${duplicateGroups} titles)`,
    );

    return {
      records: winners.map((candidate) => candidate.record),
      groups: winners.length,
      duplicateGroups,
      duplicatesRemoved,
    };
  }

  /**
   * Strictly better only; an exact tie keeps the earlier record
   */
  private beats(record: CanonicalRecord, score: number, current: Candidate): boolean {
    if (score !== current.score) {
      return score > current.score;
    }
    const rating = ratingValue(record.rating) ?? Number.NEGATIVE_INFINITY;
    const currentRating = ratingValue(current.record.rating) ?? Number.NEGATIVE_INFINITY;
    return rating > currentRating;
  }
}
