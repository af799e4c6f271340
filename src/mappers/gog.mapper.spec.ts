import { GogMapper } from './gog.mapper';
import { DataSource } from '../interfaces/data-source.interface';
import { mockRawRecords } from '../__mocks__/raw-record.fixtures';

describe('GogMapper', () => {
  let mapper: GogMapper;

  beforeEach(() => {
    mapper = new GogMapper();
  });

  it('should have correct name and source', () => {
    expect(mapper.name).toBe('GogMapper');
    expect(mapper.source).toBe(DataSource.GOG);
  });

  describe('canMap', () => {
    it('should return true for GOG labels', () => {
      expect(mapper.canMap('GOG')).toBe(true);
      expect(mapper.canMap('gog.com')).toBe(true);
      expect(mapper.canMap('GOG com')).toBe(true);
    });

    it('should return false for other storefronts', () => {
      expect(mapper.canMap('Steam')).toBe(false);
    });
  });

  it('should rename the star rating', () => {
    const mapped = mapper.map(mockRawRecords.gogStars);

    expect(mapped).toEqual({
      game_title: 'Star Game',
      rating_raw: '4.5/5',
      price: '€ 14,99',
      game_url: 'https://gog.example.com/game/star_game',
    });
  });
});
