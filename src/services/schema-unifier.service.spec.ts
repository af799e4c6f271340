import { SchemaUnifierService } from './schema-unifier.service';
import { DataSource } from '../interfaces/data-source.interface';
import { CleanedRecord } from '../interfaces/canonical-record.interface';
import { DEFAULT_EXTRA_FIELDS } from '../config/source-field-maps.config';
import { createCanonicalRecord } from '../__mocks__/raw-record.fixtures';

describe('SchemaUnifierService', () => {
  let service: SchemaUnifierService;

  beforeEach(() => {
    service = new SchemaUnifierService();
  });

  const sparse: CleanedRecord = {
    dataSource: DataSource.GOG,
    gameTitle: 'Sparse Game',
    genres: 'Puzzle',
    extras: { user_tags: 'Relaxing', review_summary: 'Positive', editions: '' },
  };

  it('should fill every absent canonical field with null', () => {
    expect(service.unifyRecord(sparse, DEFAULT_EXTRA_FIELDS)).toEqual(
      createCanonicalRecord({
        dataSource: DataSource.GOG,
        gameTitle: 'Sparse Game',
        genres: 'Puzzle',
        extras: { user_tags: 'Relaxing' },
      }),
    );
  });

  it('should default the rating to missing', () => {
    expect(service.unifyRecord(sparse, []).rating).toEqual({ kind: 'missing' });
  });

  it('should keep only allow-listed extras', () => {
    expect(service.unifyRecord(sparse, ['review_summary']).extras).toEqual({
      review_summary: 'Positive',
    });
    expect(service.unifyRecord(sparse, []).extras).toEqual({});
  });

  it('should be idempotent', () => {
    const once = service.unify([sparse], DEFAULT_EXTRA_FIELDS);
    const twice = service.unify(once, DEFAULT_EXTRA_FIELDS);

    expect(twice).toEqual(once);
  });

  it('should keep existing values', () => {
    const record = createCanonicalRecord({
      rating: { kind: 'unrated' },
      reviewCount: 0,
      originalPrice: 0,
    });

    expect(service.unifyRecord(record, [])).toEqual(record);
  });
});
