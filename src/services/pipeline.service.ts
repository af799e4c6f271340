import { Injectable, Logger, Optional } from '@nestjs/common';
import { CanonicalRecord } from '../interfaces/canonical-record.interface';
import { DataSource } from '../interfaces/data-source.interface';
import { PipelineOptions } from '../interfaces/pipeline-options.interface';
import {
  PipelineReport,
  PipelineStage,
  SkippedSource,
  SourceReport,
  StageReport,
} from '../interfaces/pipeline-report.interface';
import { SourceBatch } from '../interfaces/raw-record.interface';
import { PipelineException, PipelineInvariantException } from '../exceptions';
import { MetricsService } from '../metrics/metrics.service';
import { BusinessRulesService } from './business-rules.service';
import { DeduplicationService } from './deduplication.service';
import { MergeService, UnifiedBatch } from './merge.service';
import { RecordValidationService } from './record-validation.service';
import { SchemaUnifierService } from './schema-unifier.service';
import { SourceMappingService } from './source-mapping.service';

/**
 * Final records of a run and the report explaining every row they lost
 */
export interface PipelineResult {
  records: CanonicalRecord[];
  report: PipelineReport;
}

/** Columns whose null counts are reported for the final set */
const COMPLETENESS_COLUMNS: ReadonlyArray<[string, (record: CanonicalRecord) => boolean]> = [
  ['release_date', (record) => record.releaseDate === null],
  ['rating', (record) => record.rating.kind === 'missing'],
  ['review_count', (record) => record.reviewCount === null],
  ['genres', (record) => record.genres === null],
  ['platform', (record) => record.platform === null],
  ['developer', (record) => record.developer === null],
  ['publisher', (record) => record.publisher === null],
  ['description', (record) => record.description === null],
  ['game_url', (record) => record.gameUrl === null],
];

/**
 * Build a stage report, refusing row deltas no rule accounts for
 */
export function buildStageReport(
  stage: PipelineStage,
  rowsIn: number,
  rowsOut: number,
  drops: Record<string, number> = {},
): StageReport {
  const dropped = Object.values(drops).reduce((sum, count) => sum + count, 0);
  if (rowsIn - rowsOut !== dropped) {
    throw new PipelineInvariantException(
      `Stage ${stage} lost ${rowsIn - rowsOut} rows but its rules account for ${dropped}`,
    );
  }
  return { stage, rowsIn, rowsOut, drops };
}

/**
 * Pipeline Service
 *
 * Runs source batches through mapping, validation, schema unification,
 * merge, deduplication and business rules, and reports the row counts of
 * every stage. Synchronous: all batches are already in memory.
 */
@Injectable()
export class PipelineService {
  private readonly logger = new Logger(PipelineService.name);

  constructor(
    private readonly mappingService: SourceMappingService,
    private readonly validationService: RecordValidationService,
    private readonly unifierService: SchemaUnifierService,
    private readonly mergeService: MergeService,
    private readonly deduplicationService: DeduplicationService,
    private readonly businessRulesService: BusinessRulesService,
    @Optional() private readonly metricsService?: MetricsService,
  ) {}

  /**
   * Run the full pipeline
   *
   * @param batches One batch per source, merged in this order
   * @param options Cleaning, unification and rule settings
   * @param skippedSources Sources the loader left out, carried into the report
   * @throws UnknownSourceException if a batch label matches no mapper
   */
  run(
    batches: SourceBatch[],
    options: PipelineOptions,
    skippedSources: SkippedSource[] = [],
  ): PipelineResult {
    const startTime = Date.now();
    const stages: StageReport[] = [];

    try {
      const rowsIn = batches.reduce((sum, batch) => sum + batch.records.length, 0);

      const mapped = batches.map((batch) => this.mappingService.mapBatch(batch));
      stages.push(buildStageReport('mapping', rowsIn, rowsIn));

      const validated = mapped.map((batch) => this.validationService.validate(batch, options));
      const sources: SourceReport[] = validated.map((result) => result.report);
      const validatedRows = sources.reduce((sum, report) => sum + report.kept, 0);
      stages.push(
        buildStageReport('validation', rowsIn, validatedRows, {
          'missing-title': sources.reduce((sum, report) => sum + report.droppedMissingTitle, 0),
          'duplicate-url': sources.reduce((sum, report) => sum + report.droppedDuplicateUrl, 0),
          malformed: sources.reduce((sum, report) => sum + report.droppedMalformed, 0),
        }),
      );

      const unified: UnifiedBatch[] = validated.map((result) => ({
        source: result.source,
        records: this.unifierService.unify(result.records, options.extraFields),
      }));
      stages.push(buildStageReport('unification', validatedRows, validatedRows));

      const merged = this.mergeService.merge(unified);
      stages.push(buildStageReport('merge', validatedRows, merged.records.length));

      const deduplicated = this.deduplicationService.resolve(merged.records);
      stages.push(
        buildStageReport('deduplication', merged.records.length, deduplicated.records.length, {
          'duplicate-title': deduplicated.duplicatesRemoved,
        }),
      );

      const ruled = this.businessRulesService.apply(deduplicated.records, options.enabledRules);
      stages.push(
        buildStageReport(
          'business-rules',
          deduplicated.records.length,
          ruled.records.length,
          this.definedCounts(ruled.drops),
        ),
      );

      const finishedAt = Date.now();
      const report: PipelineReport = {
        startedAt: new Date(startTime).toISOString(),
        finishedAt: new Date(finishedAt).toISOString(),
        durationMs: finishedAt - startTime,
        sources,
        skippedSources,
        stages,
        mutations: ruled.mutations,
        outputBySource: this.countBySource(ruled.records),
        missingByColumn: this.countMissing(ruled.records),
        rowsIn,
        rowsOut: ruled.records.length,
      };

      this.recordMetrics(report);
      this.logger.log(
        `Pipeline finished: ${rowsIn} rows in, ${report.rowsOut} rows out ` +
          `from ${batches.length} sources in ${report.durationMs}ms`,
      );

      return { records: ruled.records, report };
    } catch (error) {
      this.metricsService?.recordFailure(
        error instanceof PipelineException ? error.name : 'unexpected',
      );
      throw error;
    }
  }

  private definedCounts(counts: Partial<Record<string, number>>): Record<string, number> {
    const defined: Record<string, number> = {};
    for (const [key, value] of Object.entries(counts)) {
      if (value !== undefined) {
        defined[key] = value;
      }
    }
    return defined;
  }

  private countBySource(records: CanonicalRecord[]): Partial<Record<DataSource, number>> {
    const counts: Partial<Record<DataSource, number>> = {};
    for (const record of records) {
      counts[record.dataSource] = (counts[record.dataSource] ?? 0) + 1;
    }
    return counts;
  }

  private countMissing(records: CanonicalRecord[]): Record<string, number> {
    const missing: Record<string, number> = {};
    for (const [column, isMissing] of COMPLETENESS_COLUMNS) {
      missing[column] = records.filter(isMissing).length;
    }
    return missing;
  }

  private recordMetrics(report: PipelineReport): void {
    if (!this.metricsService) {
      return;
    }
    for (const source of report.sources) {
      this.metricsService.recordSource(source.source, source.received);
    }
    for (const stage of report.stages) {
      this.metricsService.recordStage(stage.stage, stage.rowsIn, stage.rowsOut, stage.drops);
    }
    this.metricsService.recordRun(report.durationMs / 1000);
  }
}
