import { DataSource } from '../interfaces/data-source.interface';
import { BaseSourceMapper } from './base.mapper';

/**
 * Mapper for GOG catalog exports. Ratings are 0-5 stars.
 */
export class GogMapper extends BaseSourceMapper {
  readonly name = 'GogMapper';
  readonly source = DataSource.GOG;

  protected readonly sourceIdentifiers = ['gog', 'gog.com', 'gog_com'];
}
