import { extractGenres, titleCase } from './genre.normalizer';

describe('genre normalizer', () => {
  describe('titleCase', () => {
    it('should capitalize every word', () => {
      expect(titleCase('open world')).toBe('Open World');
      expect(titleCase('sci-fi')).toBe('Sci-Fi');
      expect(titleCase('RPG')).toBe('Rpg');
    });
  });

  describe('extractGenres', () => {
    it('should split on commas, semicolons and pipes', () => {
      expect(extractGenres('action, RPG;indie|sci-fi')).toBe('Action, Rpg, Indie, Sci-Fi');
    });

    it('should take list input token by token', () => {
      expect(extractGenres(['Action', 'strategy; simulation'])).toBe('Action, Strategy, Simulation');
    });

    it('should decode entities before splitting', () => {
      expect(extractGenres('Action &amp; Adventure; Puzzle')).toBe('Action & Adventure, Puzzle');
      expect(extractGenres(['Hack &amp; Slash'])).toBe('Hack & Slash');
    });

    it('should drop single-character tokens', () => {
      expect(extractGenres('a, Puzzle')).toBe('Puzzle');
    });

    it('should return null when nothing is left', () => {
      expect(extractGenres('')).toBeNull();
      expect(extractGenres(' , ; ')).toBeNull();
      expect(extractGenres(null)).toBeNull();
    });
  });
});
