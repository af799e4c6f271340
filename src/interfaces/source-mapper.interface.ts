import { DataSource } from './data-source.interface';
import { RawRecord } from './raw-record.interface';

/**
 * Scale a storefront publishes its rating on.
 * A raw value in [0, max] becomes value * factor on the 0-100 scale.
 */
export interface RatingScale {
  max: number;
  factor: number;
}

/**
 * Interface for source-specific mapping strategies.
 * Each storefront implements this interface.
 */
export interface SourceMapper {
  /** Unique identifier for this mapper */
  readonly name: string;

  /** The source this mapper handles */
  readonly source: DataSource;

  /** Raw column name to canonical field name */
  readonly fieldMap: Readonly<Record<string, string>>;

  /**
   * Check if this mapper handles the given source label
   * @param label - Label attached to a batch, e.g. "Instant Gaming"
   */
  canMap(label: string): boolean;

  /**
   * Rename a single record's keys to canonical field names.
   * Unmapped keys pass through and missing keys stay absent.
   */
  map(record: RawRecord): RawRecord;

  /** Map every record of a batch, preserving order */
  mapMany(records: RawRecord[]): RawRecord[];
}

/**
 * Records of one batch after mapping, tagged with the resolved source
 */
export interface MappedBatch {
  source: DataSource;
  records: RawRecord[];
}
