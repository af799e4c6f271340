import { ConfigService } from '@nestjs/config';
import { join } from 'path';
import {
  loadCatalogSettings,
  parseBusinessRules,
  parseList,
  parseOutputFormats,
  parseSourceList,
} from './catalog.config';
import { EnvironmentVariables, validateEnvironment } from '../dto/environment.dto';

describe('catalog config', () => {
  describe('parseList', () => {
    it('should trim entries and drop empty ones', () => {
      expect(parseList(' a, b ,,c ')).toEqual(['a', 'b', 'c']);
      expect(parseList('')).toEqual([]);
    });
  });

  describe('parseSourceList', () => {
    it('should resolve files under the input directory', () => {
      expect(parseSourceList('Steam:steam.csv, Instant Gaming : ig.json', 'data')).toEqual([
        { source: 'Steam', filePath: join('data', 'steam.csv') },
        { source: 'Instant Gaming', filePath: join('data', 'ig.json') },
      ]);
    });

    it('should reject entries without a label or file', () => {
      expect(() => parseSourceList('steam.csv', 'data')).toThrow(
        'Invalid source entry "steam.csv", expected Label:file',
      );
      expect(() => parseSourceList('Steam:', 'data')).toThrow('Invalid source entry "Steam:"');
    });
  });

  describe('parseOutputFormats', () => {
    it('should accept known formats case-insensitively', () => {
      expect(parseOutputFormats('CSV, xlsx')).toEqual(['csv', 'xlsx']);
    });

    it('should reject unknown formats', () => {
      expect(() => parseOutputFormats('csv,pdf')).toThrow('Unsupported output format "pdf"');
    });
  });

  describe('parseBusinessRules', () => {
    it('should allow disabling every rule', () => {
      expect(parseBusinessRules('')).toEqual([]);
    });

    it('should reject unknown rules', () => {
      expect(() => parseBusinessRules('mark-unrated,drop-everything')).toThrow(
        'Unknown business rule "drop-everything"',
      );
    });
  });

  describe('loadCatalogSettings', () => {
    it('should resolve settings from validated configuration', () => {
      const configService = new ConfigService<EnvironmentVariables, true>({
        ...validateEnvironment({
          CATALOG_INPUT_DIR: 'in',
          CATALOG_SOURCES: 'GOG:gog.csv',
          CATALOG_OUTPUT_FILE: 'out/catalog',
          CATALOG_OUTPUT_FORMATS: 'json,csv',
          CATALOG_MISSING_SOURCE_POLICY: 'skip',
          CATALOG_BUSINESS_RULES: 'mark-unrated',
          CATALOG_EXTRA_FIELDS: 'user_tags',
          CATALOG_METRICS_FILE: 'out/metrics.prom',
        }),
      });

      expect(loadCatalogSettings(configService)).toEqual({
        sources: [{ source: 'GOG', filePath: join('in', 'gog.csv') }],
        outputFile: 'out/catalog',
        outputFormats: ['json', 'csv'],
        missingSourcePolicy: 'skip',
        platformPolicy: 'canonical',
        descriptionMaxLength: 1000,
        extraFields: ['user_tags'],
        enabledRules: ['mark-unrated'],
        reportFile: undefined,
        metricsFile: 'out/metrics.prom',
      });
    });
  });
});
