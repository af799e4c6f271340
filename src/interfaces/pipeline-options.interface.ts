import { BusinessRuleName } from './business-rule.interface';

/**
 * How platform strings are normalized for a whole run.
 * - canonical: keyword match into Windows / Mac / Linux
 * - passthrough: cleaned text as the storefront wrote it
 */
export type PlatformPolicy = 'canonical' | 'passthrough';

/**
 * What to do when a configured source cannot be loaded.
 */
export type MissingSourcePolicy = 'abort' | 'skip';

export type OutputFormat = 'csv' | 'json' | 'xlsx';

/**
 * Options controlling field cleaning during validation
 */
export interface CleaningOptions {
  platformPolicy: PlatformPolicy;

  /** Descriptions are truncated to this many characters */
  descriptionMaxLength: number;

  /** Day against which release status is derived */
  referenceDate: Date;
}

/**
 * Options for a single pipeline run
 */
export interface PipelineOptions extends CleaningOptions {
  /** Source-only fields kept through schema unification */
  extraFields: string[];

  /** Business rules to apply, in their fixed order */
  enabledRules: BusinessRuleName[];
}
