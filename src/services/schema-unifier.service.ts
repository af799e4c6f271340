import { Injectable } from '@nestjs/common';
import { CanonicalRecord, CleanedRecord } from '../interfaces/canonical-record.interface';
import { RawRecord, RawValue } from '../interfaces/raw-record.interface';
import { MISSING_RATING } from '../utils/rating';

/**
 * Gives every record the full canonical field set. Absent fields become
 * null, source-only fields are dropped unless allow-listed.
 *
 * Applying it to an already unified record returns an equal record.
 */
@Injectable()
export class SchemaUnifierService {
  unify(records: CleanedRecord[], extraFields: readonly string[]): CanonicalRecord[] {
    return records.map((record) => this.unifyRecord(record, extraFields));
  }

  unifyRecord(record: CleanedRecord, extraFields: readonly string[]): CanonicalRecord {
    return {
      dataSource: record.dataSource,
      gameTitle: record.gameTitle,
      releaseDate: record.releaseDate ?? null,
      rating: record.rating ?? MISSING_RATING,
      reviewCount: record.reviewCount ?? null,
      originalPrice: record.originalPrice ?? null,
      discountedPrice: record.discountedPrice ?? null,
      discountPercentage: record.discountPercentage ?? null,
      genres: record.genres ?? null,
      platform: record.platform ?? null,
      developer: record.developer ?? null,
      publisher: record.publisher ?? null,
      description: record.description ?? null,
      gameUrl: record.gameUrl ?? null,
      releaseStatus: record.releaseStatus ?? null,
      extras: this.projectExtras(record.extras, extraFields),
    };
  }

  private projectExtras(extras: RawRecord, allowed: readonly string[]): RawRecord {
    const projected: RawRecord = {};
    for (const field of allowed) {
      const value: RawValue = extras[field];
      if (value !== null && value !== undefined && value !== '') {
        projected[field] = value;
      }
    }
    return projected;
  }
}
