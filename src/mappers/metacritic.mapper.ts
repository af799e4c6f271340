import { DataSource } from '../interfaces/data-source.interface';
import { BaseSourceMapper } from './base.mapper';

/**
 * Mapper for Metacritic exports. The critic score is the rating.
 */
export class MetacriticMapper extends BaseSourceMapper {
  readonly name = 'MetacriticMapper';
  readonly source = DataSource.METACRITIC;

  protected readonly sourceIdentifiers = ['metacritic'];
}
