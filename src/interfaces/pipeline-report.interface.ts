import { BusinessRuleName } from './business-rule.interface';
import { DataSource } from './data-source.interface';

export type PipelineStage =
  | 'mapping'
  | 'validation'
  | 'unification'
  | 'merge'
  | 'deduplication'
  | 'business-rules';

/**
 * Row counts of one per-source validation pass
 */
export interface SourceReport {
  source: DataSource;

  /** Records received from the loader */
  received: number;

  droppedMissingTitle: number;
  droppedDuplicateUrl: number;

  /** Records whose cleaning failed outright */
  droppedMalformed: number;

  /** Records handed on to unification */
  kept: number;
}

/**
 * Row counts of one pipeline stage. `rowsIn - rowsOut` always equals the
 * sum of `drops`.
 */
export interface StageReport {
  stage: PipelineStage;
  rowsIn: number;
  rowsOut: number;
  drops: Record<string, number>;
}

/**
 * A source the loader could not read, reported under the skip policy
 */
export interface SkippedSource {
  source: string;
  reason: string;
}

/**
 * Structured summary of a full run
 */
export interface PipelineReport {
  startedAt: string;
  finishedAt: string;
  durationMs: number;

  sources: SourceReport[];
  skippedSources: SkippedSource[];
  stages: StageReport[];

  /** Records changed (not dropped) per business rule */
  mutations: Partial<Record<BusinessRuleName, number>>;

  /** Final rows per source */
  outputBySource: Partial<Record<DataSource, number>>;

  /** Null count per key column in the final rows */
  missingByColumn: Record<string, number>;

  rowsIn: number;
  rowsOut: number;
}
