import { Injectable, Logger } from '@nestjs/common';
import { mkdirSync, writeFileSync } from 'fs';
import { dirname } from 'path';
import * as XLSX from 'xlsx';
import {
  CANONICAL_COLUMNS,
  CanonicalRecord,
  CanonicalRow,
} from '../interfaces/canonical-record.interface';
import { OutputFormat } from '../interfaces/pipeline-options.interface';
import { RawValue } from '../interfaces/raw-record.interface';
import { exportRating } from '../utils/rating';

export type CellValue = string | number | boolean | null;

/** Output row: canonical columns followed by extras */
export type OutputRow = CanonicalRow & Record<string, CellValue>;

const SHEET_NAME = 'catalog';

export function csvEscape(value: CellValue): string {
  const text = String(value ?? '');
  if (/[",\n\r]/.test(text)) {
    return `"${text.replace(/"/g, '""')}"`;
  }
  return text;
}

export function withExt(basePathNoExt: string, ext: string): string {
  return `${basePathNoExt}.${ext.replace(/^\./, '')}`;
}

function toCell(value: RawValue): CellValue {
  if (value === undefined) {
    return null;
  }
  if (Array.isArray(value)) {
    return value.join(', ');
  }
  return value;
}

/**
 * Catalog Writer Service
 *
 * Serializes the final records to CSV (UTF-8 with BOM), JSON and XLSX.
 */
@Injectable()
export class CatalogWriterService {
  private readonly logger = new Logger(CatalogWriterService.name);

  toRow(record: CanonicalRecord): OutputRow {
    const row: OutputRow = {
      data_source: record.dataSource,
      game_title: record.gameTitle,
      release_date: record.releaseDate,
      rating: exportRating(record.rating),
      review_count: record.reviewCount,
      original_price: record.originalPrice,
      discounted_price: record.discountedPrice,
      discount_percentage: record.discountPercentage,
      genres: record.genres,
      platform: record.platform,
      developer: record.developer,
      publisher: record.publisher,
      description: record.description,
      game_url: record.gameUrl,
      release_status: record.releaseStatus,
    };
    for (const [key, value] of Object.entries(record.extras)) {
      row[key] = toCell(value);
    }
    return row;
  }

  /**
   * Canonical columns, then every extra column in order of first appearance
   */
  columnsFor(rows: OutputRow[]): string[] {
    const columns: string[] = [...CANONICAL_COLUMNS];
    const seen = new Set(columns);
    for (const row of rows) {
      for (const key of Object.keys(row)) {
        if (!seen.has(key)) {
          seen.add(key);
          columns.push(key);
        }
      }
    }
    return columns;
  }

  toCsv(records: CanonicalRecord[]): string {
    const rows = records.map((record) => this.toRow(record));
    const columns = this.columnsFor(rows);
    const lines = [
      columns.join(','),
      ...rows.map((row) => columns.map((column) => csvEscape(row[column] ?? null)).join(',')),
    ];
    return `\ufeff${lines.join('\n')}\n`;
  }

  toJson(records: CanonicalRecord[]): string {
    return JSON.stringify(
      records.map((record) => this.toRow(record)),
      null,
      2,
    );
  }

  writeXlsx(filePath: string, records: CanonicalRecord[]): void {
    const rows = records.map((record) => this.toRow(record));
    const workbook = XLSX.utils.book_new();
    const sheet = XLSX.utils.json_to_sheet(rows, { header: this.columnsFor(rows) });
    XLSX.utils.book_append_sheet(workbook, sheet, SHEET_NAME);
    XLSX.writeFile(workbook, filePath);
  }

  /**
   * Write one file per format next to `outBasePathNoExt`
   *
   * @returns Paths written, in format order
   */
  write(outBasePathNoExt: string, formats: OutputFormat[], records: CanonicalRecord[]): string[] {
    mkdirSync(dirname(outBasePathNoExt), { recursive: true });

    const written: string[] = [];
    for (const format of formats) {
      const filePath = withExt(outBasePathNoExt, format);
      switch (format) {
        case 'csv':
          writeFileSync(filePath, this.toCsv(records), 'utf8');
          break;
        case 'json':
          writeFileSync(filePath, this.toJson(records), 'utf8');
          break;
        case 'xlsx':
          this.writeXlsx(filePath, records);
          break;
      }
      written.push(filePath);
      this.logger.log(`Wrote ${records.length} records to ${filePath}`);
    }
    return written;
  }
}
