import { Injectable, Logger } from '@nestjs/common';
import { existsSync, readFileSync } from 'fs';
import { extname } from 'path';
import { TextDecoder } from 'util';
import * as XLSX from 'xlsx';
import { SourceLoadException } from '../exceptions';
import { MissingSourcePolicy } from '../interfaces/pipeline-options.interface';
import { SkippedSource } from '../interfaces/pipeline-report.interface';
import { RawRecord, RawValue, SourceBatch } from '../interfaces/raw-record.interface';

/**
 * A scraper export to load, labelled with the source it came from
 */
export interface SourceFile {
  source: string;
  filePath: string;
}

export interface LoadResult {
  batches: SourceBatch[];
  skipped: SkippedSource[];
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === 'string');
}

/**
 * Narrow a parsed cell or JSON value to a raw record value. Nested
 * structures are kept as their JSON text.
 */
function toRawValue(value: unknown): RawValue {
  if (
    value === null ||
    value === undefined ||
    typeof value === 'string' ||
    typeof value === 'number' ||
    typeof value === 'boolean'
  ) {
    return value;
  }
  if (isStringArray(value)) {
    return value;
  }
  if (value instanceof Date) {
    return value.toISOString().slice(0, 10);
  }
  return JSON.stringify(value);
}

function toRawRecord(row: Record<string, unknown>): RawRecord {
  const record: RawRecord = {};
  for (const [key, value] of Object.entries(row)) {
    record[key.trim()] = toRawValue(value);
  }
  return record;
}

/**
 * Source Loader Service
 *
 * Reads scraper exports (.csv, .xlsx, .json) into raw batches.
 */
@Injectable()
export class SourceLoaderService {
  private readonly logger = new Logger(SourceLoaderService.name);

  /**
   * Load every file in order. Under the `skip` policy a file that cannot be
   * read is left out and reported; under `abort` the first failure throws.
   */
  loadAll(files: SourceFile[], policy: MissingSourcePolicy): LoadResult {
    const batches: SourceBatch[] = [];
    const skipped: SkippedSource[] = [];

    for (const file of files) {
      try {
        batches.push(this.load(file));
      } catch (error) {
        if (policy === 'abort' || !(error instanceof SourceLoadException)) {
          throw error;
        }
        this.logger.warn(`Skipping source ${file.source}: ${error.message}`);
        skipped.push({ source: file.source, reason: error.message });
      }
    }

    return { batches, skipped };
  }

  /**
   * Load one file into a batch
   *
   * @throws SourceLoadException if the file is missing, unreadable or of an unknown type
   */
  load(file: SourceFile): SourceBatch {
    if (!existsSync(file.filePath)) {
      throw new SourceLoadException(file.source, file.filePath, new Error('file not found'));
    }

    let records: RawRecord[];
    try {
      records = this.readRecords(file.filePath);
    } catch (error) {
      throw new SourceLoadException(
        file.source,
        file.filePath,
        error instanceof Error ? error : new Error(String(error)),
      );
    }

    this.logger.log(`Loaded ${records.length} records for ${file.source} from ${file.filePath}`);
    return { source: file.source, records };
  }

  private readRecords(filePath: string): RawRecord[] {
    const extension = extname(filePath).toLowerCase();
    switch (extension) {
      case '.csv':
        return this.readSheet(XLSX.read(this.readText(filePath), { type: 'string', raw: true }));
      case '.xlsx':
        return this.readSheet(XLSX.read(readFileSync(filePath), { type: 'buffer' }));
      case '.json':
        return this.readJson(this.readText(filePath));
      default:
        throw new Error(`unsupported file type "${extension}"`);
    }
  }

  /**
   * File contents as text: UTF-8, or Latin-1 when the bytes are not valid
   * UTF-8. A leading BOM is removed.
   */
  readText(filePath: string): string {
    const buffer = readFileSync(filePath);
    let text: string;
    try {
      text = new TextDecoder('utf-8', { fatal: true }).decode(buffer);
    } catch {
      this.logger.warn(`${filePath} is not valid UTF-8, reading as Latin-1`);
      text = buffer.toString('latin1');
    }
    return text.replace(/^\ufeff/, '');
  }

  private readSheet(workbook: XLSX.WorkBook): RawRecord[] {
    const sheetName = workbook.SheetNames[0];
    if (sheetName === undefined) {
      return [];
    }
    const rows = XLSX.utils.sheet_to_json<Record<string, unknown>>(workbook.Sheets[sheetName], {
      defval: null,
      raw: true,
    });
    return rows.map(toRawRecord);
  }

  private readJson(text: string): RawRecord[] {
    const parsed: unknown = JSON.parse(text);
    if (!Array.isArray(parsed)) {
      throw new Error('expected a JSON array of records');
    }
    return parsed.map((entry, index) => {
      if (!isPlainObject(entry)) {
        throw new Error(`entry ${index} is not a record object`);
      }
      return toRawRecord(entry);
    });
  }
}
