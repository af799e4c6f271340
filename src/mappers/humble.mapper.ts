import { DataSource } from '../interfaces/data-source.interface';
import { BaseSourceMapper } from './base.mapper';

/**
 * Mapper for Humble Bundle store exports. Ratings, when present, are 0-100.
 */
export class HumbleMapper extends BaseSourceMapper {
  readonly name = 'HumbleMapper';
  readonly source = DataSource.HUMBLE;

  protected readonly sourceIdentifiers = ['humble', 'humble_bundle', 'humblebundle'];
}
