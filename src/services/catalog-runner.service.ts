import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { mkdirSync, writeFileSync } from 'fs';
import { dirname } from 'path';
import { CatalogSettings, loadCatalogSettings } from '../config/catalog.config';
import { EnvironmentVariables } from '../dto/environment.dto';
import { MetricsService } from '../metrics/metrics.service';
import { formatReport } from '../utils/report-format';
import { CatalogWriterService } from './catalog-writer.service';
import { PipelineResult, PipelineService } from './pipeline.service';
import { SourceLoaderService } from './source-loader.service';

export interface CatalogRunResult extends PipelineResult {
  outputFiles: string[];
}

/**
 * Catalog Runner Service
 *
 * Loads the configured exports, runs the pipeline, then writes the
 * dataset together with the optional report and metrics files.
 */
@Injectable()
export class CatalogRunnerService {
  private readonly logger = new Logger(CatalogRunnerService.name);

  constructor(
    private readonly configService: ConfigService<EnvironmentVariables, true>,
    private readonly loader: SourceLoaderService,
    private readonly pipeline: PipelineService,
    private readonly writer: CatalogWriterService,
    private readonly metricsService: MetricsService,
  ) {}

  async run(settings: CatalogSettings = loadCatalogSettings(this.configService)): Promise<CatalogRunResult> {
    this.logger.log(`Loading ${settings.sources.length} sources`);
    const { batches, skipped } = this.loader.loadAll(settings.sources, settings.missingSourcePolicy);

    const result = this.pipeline.run(
      batches,
      {
        platformPolicy: settings.platformPolicy,
        descriptionMaxLength: settings.descriptionMaxLength,
        referenceDate: new Date(),
        extraFields: settings.extraFields,
        enabledRules: settings.enabledRules,
      },
      skipped,
    );

    const outputFiles = this.writer.write(settings.outputFile, settings.outputFormats, result.records);

    if (settings.reportFile) {
      this.writeFile(settings.reportFile, JSON.stringify(result.report, null, 2));
      this.logger.log(`Report written to ${settings.reportFile}`);
    }
    if (settings.metricsFile) {
      this.writeFile(settings.metricsFile, await this.metricsService.getMetrics());
      this.logger.log(`Metrics written to ${settings.metricsFile}`);
    }

    for (const line of formatReport(result.report)) {
      this.logger.log(line);
    }

    return { ...result, outputFiles };
  }

  private writeFile(filePath: string, contents: string): void {
    mkdirSync(dirname(filePath), { recursive: true });
    writeFileSync(filePath, contents, 'utf8');
  }
}
