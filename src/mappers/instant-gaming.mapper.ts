import { DataSource } from '../interfaces/data-source.interface';
import { BaseSourceMapper } from './base.mapper';

/**
 * Mapper for Instant Gaming exports.
 *
 * Handles quirks:
 * - the 0-10 score lives in `ig_rating`
 * - genres are exported under the singular `genre`
 * - the charged price is `current_price`, left for the price calculator
 */
export class InstantGamingMapper extends BaseSourceMapper {
  readonly name = 'InstantGamingMapper';
  readonly source = DataSource.INSTANT_GAMING;

  protected readonly sourceIdentifiers = ['instant_gaming', 'instantgaming', 'ig'];
}
