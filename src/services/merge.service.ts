import { Injectable, Logger } from '@nestjs/common';
import { CanonicalRecord } from '../interfaces/canonical-record.interface';
import { DataSource } from '../interfaces/data-source.interface';
import { PipelineInvariantException } from '../exceptions';

/**
 * Unified records of one source, ready to merge
 */
export interface UnifiedBatch {
  source: DataSource;
  records: CanonicalRecord[];
}

export interface MergeResult {
  records: CanonicalRecord[];
  countsBySource: Partial<Record<DataSource, number>>;
}

/**
 * Concatenates per-source batches into one working set: batch order
 * first, then the order within each batch. Nothing is dropped here.
 */
@Injectable()
export class MergeService {
  private readonly logger = new Logger(MergeService.name);

  merge(batches: UnifiedBatch[]): MergeResult {
    const records: CanonicalRecord[] = [];
    const countsBySource: Partial<Record<DataSource, number>> = {};

    for (const batch of batches) {
      for (const record of batch.records) {
        records.push(record);
      }
      countsBySource[batch.source] = (countsBySource[batch.source] ?? 0) + batch.records.length;
    }

    const expected = batches.reduce((sum, batch) => sum + batch.records.length, 0);
    if (records.length !== expected) {
      throw new PipelineInvariantException(
        `Merge produced ${records.length} records from ${expected} inputs`,
      );
    }

    this.logger.log(
      `Merged ${records.length} records from ${batches.length} source batches ` +
        `(${Object.entries(countsBySource)
          .map(([source, count]) => `${source}: ${count}`)
          .join(', ')})`,
    );

    return { records, countsBySource };
  }
}
