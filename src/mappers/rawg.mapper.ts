import { DataSource } from '../interfaces/data-source.interface';
import { BaseSourceMapper } from './base.mapper';

/**
 * Mapper for RAWG exports. RAWG has no prices; ratings are 0-5.
 */
export class RawgMapper extends BaseSourceMapper {
  readonly name = 'RawgMapper';
  readonly source = DataSource.RAWG;

  protected readonly sourceIdentifiers = ['rawg', 'rawg.io', 'rawg_io'];
}
