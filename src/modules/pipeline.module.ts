import { Module } from '@nestjs/common';
import { MetricsModule } from '../metrics/metrics.module';
import { BusinessRulesService } from '../services/business-rules.service';
import { DeduplicationService } from '../services/deduplication.service';
import { MergeService } from '../services/merge.service';
import { PipelineService } from '../services/pipeline.service';
import { RecordValidationService } from '../services/record-validation.service';
import { SchemaUnifierService } from '../services/schema-unifier.service';
import { SourceMappingService } from '../services/source-mapping.service';
import {
  CompletenessScorer,
  DefaultMissingPricesRule,
  MarkUnratedRule,
  RequireProvenanceRule,
} from '../strategies';

@Module({
  imports: [MetricsModule],
  providers: [
    SourceMappingService,
    RecordValidationService,
    SchemaUnifierService,
    MergeService,
    DeduplicationService,
    BusinessRulesService,
    PipelineService,
    CompletenessScorer,
    DefaultMissingPricesRule,
    MarkUnratedRule,
    RequireProvenanceRule,
  ],
  exports: [PipelineService, SourceMappingService],
})
export class PipelineModule {}
