import { CanonicalRecord } from './canonical-record.interface';

/**
 * What a rule did to one record
 */
export type RuleOutcome =
  | { action: 'unchanged'; record: CanonicalRecord }
  | { action: 'mutated'; record: CanonicalRecord }
  | { action: 'dropped' };

/**
 * A single product-policy transformation applied after deduplication.
 * Rules never mutate their input; a changed record is returned as a copy.
 */
export interface BusinessRule {
  /** Name used in configuration and in the report */
  readonly name: BusinessRuleName;

  apply(record: CanonicalRecord): RuleOutcome;
}

export type BusinessRuleName =
  | 'default-missing-prices'
  | 'mark-unrated'
  | 'require-provenance';

/** Rules in the order they run */
export const BUSINESS_RULE_ORDER: readonly BusinessRuleName[] = [
  'default-missing-prices',
  'mark-unrated',
  'require-provenance',
];
