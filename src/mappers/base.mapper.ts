import { Logger } from '@nestjs/common';
import { SOURCE_FIELD_MAPS } from '../config/source-field-maps.config';
import { DataSource } from '../interfaces/data-source.interface';
import { RawRecord } from '../interfaces/raw-record.interface';
import { SourceMapper } from '../interfaces/source-mapper.interface';

/**
 * Abstract base class for all source mappers providing the rename logic.
 * Subclasses declare the source and the labels they answer to, and may
 * derive extra canonical fields from source-specific columns.
 */
export abstract class BaseSourceMapper implements SourceMapper {
  protected readonly logger: Logger;

  abstract readonly name: string;
  abstract readonly source: DataSource;

  /** Lower-cased label fragments identifying this source */
  protected abstract readonly sourceIdentifiers: readonly string[];

  constructor() {
    this.logger = new Logger(this.constructor.name);
  }

  get fieldMap(): Readonly<Record<string, string>> {
    return SOURCE_FIELD_MAPS[this.source];
  }

  canMap(label: string): boolean {
    const normalizedLabel = this.normalizeLabel(label);
    return this.sourceIdentifiers.some((id) => normalizedLabel === id);
  }

  /**
   * Rename mapped keys; everything else passes through untouched.
   * When two columns land on the same canonical name, an empty value never
   * replaces a filled one.
   */
  map(record: RawRecord): RawRecord {
    const mapped: RawRecord = {};

    for (const [key, value] of Object.entries(record)) {
      const target = this.fieldMap[key] ?? key;
      if (target in mapped && this.isEmpty(value)) {
        continue;
      }
      mapped[target] = value;
    }

    return this.deriveFields(mapped);
  }

  mapMany(records: RawRecord[]): RawRecord[] {
    const mapped = records.map((record) => this.map(record));
    this.logger.debug(`Mapped ${mapped.length} ${this.source} records`);
    return mapped;
  }

  /**
   * Source-specific fields computed from other columns. Identity by default.
   */
  protected deriveFields(record: RawRecord): RawRecord {
    return record;
  }

  /**
   * Common label cleaning: trim, lowercase, spaces and dashes to underscores
   */
  protected normalizeLabel(label: string): string {
    return label.trim().toLowerCase().replace(/[\s-]+/g, '_');
  }

  protected isEmpty(value: RawRecord[string]): boolean {
    return value === null || value === undefined || value === '';
  }
}
