import { ConfigService } from '@nestjs/config';
import { join } from 'path';
import { EnvironmentVariables } from '../dto/environment.dto';
import {
  BUSINESS_RULE_ORDER,
  BusinessRuleName,
} from '../interfaces/business-rule.interface';
import {
  MissingSourcePolicy,
  OutputFormat,
  PlatformPolicy,
} from '../interfaces/pipeline-options.interface';
import { SourceFile } from '../services/source-loader.service';

const OUTPUT_FORMATS: readonly OutputFormat[] = ['csv', 'json', 'xlsx'];

/**
 * Settings of one runner invocation, resolved from the environment
 */
export interface CatalogSettings {
  sources: SourceFile[];
  outputFile: string;
  outputFormats: OutputFormat[];
  missingSourcePolicy: MissingSourcePolicy;
  platformPolicy: PlatformPolicy;
  descriptionMaxLength: number;
  extraFields: string[];
  enabledRules: BusinessRuleName[];
  reportFile?: string;
  metricsFile?: string;
}

export function isBusinessRuleName(value: string): value is BusinessRuleName {
  return BUSINESS_RULE_ORDER.some((name) => name === value);
}

export function isOutputFormat(value: string): value is OutputFormat {
  return OUTPUT_FORMATS.some((format) => format === value);
}

/**
 * Split a comma-separated list, trimming entries and dropping empty ones
 */
export function parseList(value: string): string[] {
  return value
    .split(',')
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);
}

/**
 * Parse `Label:file,...` into source files under `inputDir`
 */
export function parseSourceList(value: string, inputDir: string): SourceFile[] {
  return parseList(value).map((entry) => {
    const separator = entry.indexOf(':');
    if (separator <= 0 || separator === entry.length - 1) {
      throw new Error(`Invalid source entry "${entry}", expected Label:file`);
    }
    return {
      source: entry.slice(0, separator).trim(),
      filePath: join(inputDir, entry.slice(separator + 1).trim()),
    };
  });
}

export function parseOutputFormats(value: string): OutputFormat[] {
  return parseList(value).map((entry) => {
    const format = entry.toLowerCase();
    if (!isOutputFormat(format)) {
      throw new Error(`Unsupported output format "${entry}"`);
    }
    return format;
  });
}

export function parseBusinessRules(value: string): BusinessRuleName[] {
  return parseList(value).map((entry) => {
    if (!isBusinessRuleName(entry)) {
      throw new Error(`Unknown business rule "${entry}"`);
    }
    return entry;
  });
}

/**
 * Resolve runner settings from validated configuration
 */
export function loadCatalogSettings(
  configService: ConfigService<EnvironmentVariables, true>,
): CatalogSettings {
  const inputDir = configService.get('CATALOG_INPUT_DIR', { infer: true });
  const missingSourcePolicy: MissingSourcePolicy =
    configService.get('CATALOG_MISSING_SOURCE_POLICY', { infer: true }) === 'skip'
      ? 'skip'
      : 'abort';
  const platformPolicy: PlatformPolicy =
    configService.get('CATALOG_PLATFORM_POLICY', { infer: true }) === 'passthrough'
      ? 'passthrough'
      : 'canonical';

  return {
    sources: parseSourceList(configService.get('CATALOG_SOURCES', { infer: true }), inputDir),
    outputFile: configService.get('CATALOG_OUTPUT_FILE', { infer: true }),
    outputFormats: parseOutputFormats(configService.get('CATALOG_OUTPUT_FORMATS', { infer: true })),
    missingSourcePolicy,
    platformPolicy,
    descriptionMaxLength: configService.get('CATALOG_DESCRIPTION_MAX_LENGTH', { infer: true }),
    extraFields: parseList(configService.get('CATALOG_EXTRA_FIELDS', { infer: true })),
    enabledRules: parseBusinessRules(configService.get('CATALOG_BUSINESS_RULES', { infer: true })),
    reportFile: configService.get('CATALOG_REPORT_FILE', { infer: true }),
    metricsFile: configService.get('CATALOG_METRICS_FILE', { infer: true }),
  };
}
