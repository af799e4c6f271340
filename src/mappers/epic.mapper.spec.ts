import { EpicMapper } from './epic.mapper';
import { DataSource } from '../interfaces/data-source.interface';

describe('EpicMapper', () => {
  let mapper: EpicMapper;

  beforeEach(() => {
    mapper = new EpicMapper();
  });

  it('should answer to Epic labels', () => {
    expect(mapper.source).toBe(DataSource.EPIC);
    expect(mapper.canMap('Epic Games Store')).toBe(true);
    expect(mapper.canMap('epic')).toBe(true);
    expect(mapper.canMap('Humble')).toBe(false);
  });

  it('should take the detailed release date and keep features as an extra', () => {
    const mapped = mapper.map({
      title: 'Epic Title',
      release_date_detailed: 'Dec 25, 2024',
      features: 'Cloud Saves',
      rating: 4,
    });

    expect(mapped).toEqual({
      game_title: 'Epic Title',
      release_date: 'Dec 25, 2024',
      game_features: 'Cloud Saves',
      rating_raw: 4,
    });
  });
});
