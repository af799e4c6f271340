import { Injectable, Logger } from '@nestjs/common';
import { CleanedRecord } from '../interfaces/canonical-record.interface';
import { DataSource } from '../interfaces/data-source.interface';
import { CleaningOptions } from '../interfaces/pipeline-options.interface';
import { SourceReport } from '../interfaces/pipeline-report.interface';
import { RawRecord } from '../interfaces/raw-record.interface';
import { MappedBatch } from '../interfaces/source-mapper.interface';
import {
  cleanText,
  deriveReleaseStatus,
  extractGenres,
  normalizeDate,
  normalizeDiscountPercentage,
  normalizePlatform,
  normalizePrice,
  normalizeRating,
  normalizeReviewCount,
  recomputeDiscountPercentage,
  resolveDiscountedPrice,
  truncateText,
} from '../normalizers';
import { numericRating } from '../utils/rating';

/** Canonical raw columns consumed by cleaning; everything else is an extra */
const CONSUMED_FIELDS: ReadonlySet<string> = new Set([
  'data_source',
  'game_title',
  'game_url',
  'release_date',
  'rating_raw',
  'review_count',
  'original_price',
  'discounted_price',
  'current_price',
  'price',
  'discount_percentage',
  'genres',
  'platform',
  'developer',
  'publisher',
  'description',
  'release_status',
]);

/**
 * Cleaned records of one source plus what happened to the rest
 */
export interface ValidationResult {
  source: DataSource;
  records: CleanedRecord[];
  report: SourceReport;
}

/**
 * Applies the field normalizers to a mapped batch and enforces the
 * per-source structural rules: a title is required and `game_url` is
 * unique within the source.
 */
@Injectable()
export class RecordValidationService {
  private readonly logger = new Logger(RecordValidationService.name);

  /**
   * Clean and validate one source batch. The input batch is not modified.
   */
  validate(batch: MappedBatch, options: CleaningOptions): ValidationResult {
    const records: CleanedRecord[] = [];
    const seenUrls = new Set<string>();
    let droppedMissingTitle = 0;
    let droppedDuplicateUrl = 0;
    let droppedMalformed = 0;

    batch.records.forEach((raw, index) => {
      let cleaned: CleanedRecord | null;
      try {
        cleaned = this.cleanRecord(raw, batch.source, options);
      } catch (error) {
        droppedMalformed++;
        this.logger.warn(
          `Failed to clean ${batch.source} record #${index}: ${error instanceof Error ? error.message : String(error)}`,
        );
        return;
      }

      if (cleaned === null) {
        droppedMissingTitle++;
        return;
      }

      if (cleaned.gameUrl) {
        if (seenUrls.has(cleaned.gameUrl)) {
          droppedDuplicateUrl++;
          this.logger.debug(`Duplicate ${batch.source} URL dropped: ${cleaned.gameUrl}`);
          return;
        }
        seenUrls.add(cleaned.gameUrl);
      }

      records.push(cleaned);
    });

    if (droppedMissingTitle > 0) {
      this.logger.warn(`Dropped ${droppedMissingTitle} ${batch.source} records without a title`);
    }
    if (droppedDuplicateUrl > 0) {
      this.logger.warn(`Dropped ${droppedDuplicateUrl} ${batch.source} records with a duplicate URL`);
    }
    this.logger.log(`Validated ${records.length}/${batch.records.length} ${batch.source} records`);

    return {
      source: batch.source,
      records,
      report: {
        source: batch.source,
        received: batch.records.length,
        droppedMissingTitle,
        droppedDuplicateUrl,
        droppedMalformed,
        kept: records.length,
      },
    };
  }

  /**
   * Normalize every field of a mapped record.
   * @returns null when the record has no usable title
   */
  cleanRecord(raw: RawRecord, source: DataSource, options: CleaningOptions): CleanedRecord | null {
    const gameTitle = cleanText(raw['game_title']);
    if (gameTitle === null) {
      return null;
    }

    const statedDiscount = normalizeDiscountPercentage(raw['discount_percentage']);
    const discountedPrice = resolveDiscountedPrice(raw);
    // without a discount the charged price is the full price
    const originalPrice =
      normalizePrice(raw['original_price']) ??
      (statedDiscount === null || statedDiscount === 0 ? discountedPrice : null);
    const releaseDate = normalizeDate(raw['release_date']);

    return {
      dataSource: source,
      gameTitle,
      releaseDate,
      rating: numericRating(normalizeRating(raw['rating_raw'], source)),
      reviewCount: normalizeReviewCount(raw['review_count']),
      originalPrice,
      discountedPrice,
      discountPercentage: recomputeDiscountPercentage(originalPrice, discountedPrice, statedDiscount),
      genres: extractGenres(raw['genres']),
      platform: normalizePlatform(raw['platform'], options.platformPolicy),
      developer: cleanText(raw['developer']),
      publisher: cleanText(raw['publisher']),
      description: truncateText(raw['description'], options.descriptionMaxLength),
      gameUrl: cleanText(raw['game_url']),
      releaseStatus: deriveReleaseStatus(releaseDate, raw['release_status'], options.referenceDate),
      extras: this.collectExtras(raw),
    };
  }

  private collectExtras(raw: RawRecord): RawRecord {
    const extras: RawRecord = {};
    for (const [key, value] of Object.entries(raw)) {
      if (!CONSUMED_FIELDS.has(key)) {
        extras[key] = value;
      }
    }
    return extras;
  }
}
