import { CanonicalRecord } from './canonical-record.interface';

/**
 * Interface for the quality ranking used to pick one record out of a group
 * of duplicates. Higher scores win.
 */
export interface IRecordScorer {
  /** Name of the scoring method */
  readonly name: string;

  /**
   * Score a single record
   * @param record Candidate from a duplicate group
   */
  score(record: CanonicalRecord): number;
}
