import { DataSource } from '../interfaces/data-source.interface';
import { BaseSourceMapper } from './base.mapper';

/**
 * Mapper for Epic Games Store exports.
 *
 * Handles quirks:
 * - the full date sits in `release_date_detailed`
 * - store features are kept as `game_features`
 */
export class EpicMapper extends BaseSourceMapper {
  readonly name = 'EpicMapper';
  readonly source = DataSource.EPIC;

  protected readonly sourceIdentifiers = ['epic', 'epic_games', 'epic_games_store', 'epicgames'];
}
