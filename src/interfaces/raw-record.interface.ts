/**
 * A single value as exported by a scraper. Spreadsheet exports only carry
 * strings; JSON exports may also carry numbers, booleans and string lists.
 */
export type RawValue = string | number | boolean | null | undefined | string[];

/**
 * Source-shaped record. Keys vary per storefront, so this stays an open map
 * until the mapper and validator turn it into a CanonicalRecord.
 */
export type RawRecord = Record<string, RawValue>;

/**
 * Records handed over by one scraper collaborator.
 */
export interface SourceBatch {
  /** Free-form source label, e.g. "steam", "Instant Gaming" */
  source: string;

  /** Records in the order the scraper produced them */
  records: RawRecord[];
}
