import { Test, TestingModule } from '@nestjs/testing';
import { buildStageReport, PipelineService } from './pipeline.service';
import { BusinessRulesService } from './business-rules.service';
import { DeduplicationService } from './deduplication.service';
import { MergeService } from './merge.service';
import { RecordValidationService } from './record-validation.service';
import { SchemaUnifierService } from './schema-unifier.service';
import { SourceMappingService } from './source-mapping.service';
import { MetricsService } from '../metrics/metrics.service';
import { CompletenessScorer } from '../strategies/scorers/completeness.scorer';
import { DefaultMissingPricesRule } from '../strategies/rules/default-missing-prices.rule';
import { MarkUnratedRule } from '../strategies/rules/mark-unrated.rule';
import { RequireProvenanceRule } from '../strategies/rules/require-provenance.rule';
import { BUSINESS_RULE_ORDER } from '../interfaces/business-rule.interface';
import { DataSource } from '../interfaces/data-source.interface';
import { PipelineInvariantException, UnknownSourceException } from '../exceptions';
import { exportRating } from '../utils/rating';
import { mockRawRecords, noRuleOptions, portalBatches } from '../__mocks__/raw-record.fixtures';

describe('PipelineService', () => {
  let module: TestingModule;
  let service: PipelineService;
  let metricsService: MetricsService;

  beforeEach(async () => {
    module = await Test.createTestingModule({
      providers: [
        PipelineService,
        SourceMappingService,
        RecordValidationService,
        SchemaUnifierService,
        MergeService,
        DeduplicationService,
        BusinessRulesService,
        CompletenessScorer,
        DefaultMissingPricesRule,
        MarkUnratedRule,
        RequireProvenanceRule,
        MetricsService,
      ],
    }).compile();
    await module.init();

    service = module.get<PipelineService>(PipelineService);
    metricsService = module.get<MetricsService>(MetricsService);
  });

  afterEach(async () => {
    await module.close();
  });

  it('should be defined', () => {
    expect(service).toBeDefined();
  });

  describe('run with business rules disabled', () => {
    it('should merge one game from two storefronts into its best record', () => {
      const { records } = service.run(portalBatches, noRuleOptions);

      expect(records).toHaveLength(1);
      expect(records[0].dataSource).toBe(DataSource.STEAM);
      expect(records[0].gameTitle).toBe('Portal 2');
      expect(exportRating(records[0].rating)).toBe(95);
    });

    it('should attribute every removed row to a rule', () => {
      const { report } = service.run(portalBatches, noRuleOptions);

      expect(report.rowsIn).toBe(2);
      expect(report.rowsOut).toBe(1);
      expect(report.stages).toEqual([
        { stage: 'mapping', rowsIn: 2, rowsOut: 2, drops: {} },
        {
          stage: 'validation',
          rowsIn: 2,
          rowsOut: 2,
          drops: { 'missing-title': 0, 'duplicate-url': 0, malformed: 0 },
        },
        { stage: 'unification', rowsIn: 2, rowsOut: 2, drops: {} },
        { stage: 'merge', rowsIn: 2, rowsOut: 2, drops: {} },
        { stage: 'deduplication', rowsIn: 2, rowsOut: 1, drops: { 'duplicate-title': 1 } },
        { stage: 'business-rules', rowsIn: 1, rowsOut: 1, drops: {} },
      ]);
      for (const stage of report.stages) {
        const dropped = Object.values(stage.drops).reduce((sum, count) => sum + count, 0);
        expect(stage.rowsIn - stage.rowsOut).toBe(dropped);
      }
    });

    it('should summarize sources and completeness', () => {
      const { report } = service.run(portalBatches, noRuleOptions);

      expect(report.sources.map((source) => [source.source, source.received, source.kept])).toEqual([
        [DataSource.STEAM, 1, 1],
        [DataSource.GOG, 1, 1],
      ]);
      expect(report.outputBySource).toEqual({ [DataSource.STEAM]: 1 });
      expect(report.missingByColumn).toEqual({
        release_date: 1,
        rating: 0,
        review_count: 1,
        genres: 1,
        platform: 1,
        developer: 1,
        publisher: 1,
        description: 1,
        game_url: 1,
      });
      expect(report.mutations).toEqual({});
    });
  });

  describe('run with business rules enabled', () => {
    const options = { ...noRuleOptions, enabledRules: [...BUSINESS_RULE_ORDER] };

    it('should mark the unreviewed winner and drop it for lacking provenance', () => {
      const { records, report } = service.run(portalBatches, options);

      expect(records).toEqual([]);
      expect(report.mutations).toEqual({
        'default-missing-prices': 1,
        'mark-unrated': 1,
        'require-provenance': 0,
      });
      expect(report.stages[5]).toEqual({
        stage: 'business-rules',
        rowsIn: 1,
        rowsOut: 0,
        drops: { 'default-missing-prices': 0, 'mark-unrated': 0, 'require-provenance': 1 },
      });
    });

    it('should keep a reviewed game with a developer', () => {
      const { records } = service.run([{ source: 'Steam', records: [mockRawRecords.steam] }], options);

      expect(records).toHaveLength(1);
      expect(records[0].rating).toEqual({ kind: 'numeric', value: 95 });
      expect(records[0].discountedPrice).toBe(1.99);
    });

    it('should show "Not yet rated" for a rated game without reviews', () => {
      const { records } = service.run(
        [
          {
            source: 'Instant Gaming',
            records: [{ title: 'Fresh', ig_rating: '8.5', review_count: '0', developer: 'Dev' }],
          },
        ],
        options,
      );

      expect(exportRating(records[0].rating)).toBe('Not yet rated');
    });
  });

  it('should count validation drops per source', () => {
    const { report } = service.run(
      [
        {
          source: 'Steam',
          records: [
            mockRawRecords.missingTitle,
            { title: 'A', url: 'https://store.example.com/app/5' },
            { title: 'B', url: 'https://store.example.com/app/5' },
          ],
        },
      ],
      noRuleOptions,
    );

    expect(report.sources[0]).toEqual({
      source: DataSource.STEAM,
      received: 3,
      droppedMissingTitle: 1,
      droppedDuplicateUrl: 1,
      droppedMalformed: 0,
      kept: 1,
    });
    expect(report.stages[1].drops).toEqual({ 'missing-title': 1, 'duplicate-url': 1, malformed: 0 });
  });

  it('should carry skipped sources into the report', () => {
    const skipped = [{ source: 'RAWG', reason: 'file not found' }];
    const { report } = service.run(portalBatches, noRuleOptions, skipped);

    expect(report.skippedSources).toEqual(skipped);
  });

  it('should handle an empty run', () => {
    const { records, report } = service.run([], noRuleOptions);

    expect(records).toEqual([]);
    expect(report.rowsIn).toBe(0);
    expect(report.rowsOut).toBe(0);
  });

  it('should fail on an unknown source and record the failure', async () => {
    expect(() => service.run([{ source: 'Itch', records: [{ title: 'A' }] }], noRuleOptions)).toThrow(
      UnknownSourceException,
    );

    const metrics = await metricsService.getMetrics();
    expect(metrics).toContain('catalog_pipeline_run_failures_total{reason="UnknownSourceException"} 1');
  });

  it('should record stage metrics', async () => {
    service.run(portalBatches, noRuleOptions);

    const metrics = await metricsService.getMetrics();
    expect(metrics).toContain('catalog_pipeline_stage_rows_in_total{stage="deduplication"} 2');
    expect(metrics).toContain('catalog_pipeline_stage_rows_out_total{stage="deduplication"} 1');
    expect(metrics).toContain(
      'catalog_pipeline_rows_dropped_total{stage="deduplication",rule="duplicate-title"} 1',
    );
    expect(metrics).toContain('catalog_pipeline_source_rows_total{source="GOG"} 1');
  });

  it('should run without a metrics service', () => {
    const bare = new PipelineService(
      module.get(SourceMappingService),
      module.get(RecordValidationService),
      module.get(SchemaUnifierService),
      module.get(MergeService),
      module.get(DeduplicationService),
      module.get(BusinessRulesService),
    );

    expect(bare.run(portalBatches, noRuleOptions).records).toHaveLength(1);
  });

  describe('buildStageReport', () => {
    it('should accept deltas explained by drops', () => {
      expect(buildStageReport('merge', 3, 1, { a: 2 })).toEqual({
        stage: 'merge',
        rowsIn: 3,
        rowsOut: 1,
        drops: { a: 2 },
      });
    });

    it('should reject unexplained deltas', () => {
      expect(() => buildStageReport('merge', 3, 1, { a: 1 })).toThrow(PipelineInvariantException);
    });
  });
});
