import { plainToInstance } from 'class-transformer';
import { IsIn, IsInt, IsOptional, IsString, Max, Min, MinLength, validateSync } from 'class-validator';

export const CATALOG_DEFAULTS = {
  inputDir: './scraped_data',
  sources:
    'Steam:steam_games_detailed.csv,GOG:gog_games_detailed.csv,instant_gaming:instant_gaming_detailed.csv',
  outputFile: './scraped_data/Master_Dataset_Final',
  outputFormats: 'csv',
  missingSourcePolicy: 'abort',
  platformPolicy: 'canonical',
  descriptionMaxLength: 1000,
  extraFields: 'user_tags,game_features,editions',
  businessRules: 'default-missing-prices,mark-unrated,require-provenance',
} as const;

/**
 * Environment variables read by the catalog runner
 */
export class EnvironmentVariables {
  @IsString()
  CATALOG_INPUT_DIR: string = CATALOG_DEFAULTS.inputDir;

  /** Comma-separated `Label:file` pairs, relative to the input directory */
  @IsString()
  @MinLength(1)
  CATALOG_SOURCES: string = CATALOG_DEFAULTS.sources;

  /** Output path; the extension of each format is appended */
  @IsString()
  CATALOG_OUTPUT_FILE: string = CATALOG_DEFAULTS.outputFile;

  @IsString()
  CATALOG_OUTPUT_FORMATS: string = CATALOG_DEFAULTS.outputFormats;

  @IsIn(['abort', 'skip'])
  CATALOG_MISSING_SOURCE_POLICY: string = CATALOG_DEFAULTS.missingSourcePolicy;

  @IsIn(['canonical', 'passthrough'])
  CATALOG_PLATFORM_POLICY: string = CATALOG_DEFAULTS.platformPolicy;

  @IsInt()
  @Min(1)
  @Max(100000)
  CATALOG_DESCRIPTION_MAX_LENGTH: number = CATALOG_DEFAULTS.descriptionMaxLength;

  @IsString()
  CATALOG_EXTRA_FIELDS: string = CATALOG_DEFAULTS.extraFields;

  /** Enabled rules; an empty value disables them all */
  @IsString()
  CATALOG_BUSINESS_RULES: string = CATALOG_DEFAULTS.businessRules;

  @IsOptional()
  @IsString()
  CATALOG_REPORT_FILE?: string;

  @IsOptional()
  @IsString()
  CATALOG_METRICS_FILE?: string;
}

/**
 * Validate the raw environment for ConfigModule
 *
 * @throws Error listing every invalid variable
 */
export function validateEnvironment(config: Record<string, unknown>): EnvironmentVariables {
  const validated = plainToInstance(EnvironmentVariables, config, {
    enableImplicitConversion: true,
  });
  const errors = validateSync(validated, { skipMissingProperties: false });

  if (errors.length > 0) {
    const details = errors
      .map((error) => `${error.property}: ${Object.values(error.constraints ?? {}).join(', ')}`)
      .join('; ');
    throw new Error(`Invalid environment configuration: ${details}`);
  }

  return validated;
}
