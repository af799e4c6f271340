import { normalizeReviewCount, parseFirstNumber } from './number.normalizer';

describe('number normalizer', () => {
  describe('parseFirstNumber', () => {
    it('should read the first number in text', () => {
      expect(parseFirstNumber('4.5/5')).toBe(4.5);
      expect(parseFirstNumber('Score: 87 of 100')).toBe(87);
    });

    it('should read a comma as the decimal point', () => {
      expect(parseFirstNumber('4,5/5')).toBe(4.5);
    });

    it('should keep the sign', () => {
      expect(parseFirstNumber('-75%')).toBe(-75);
    });

    it('should pass finite numbers through', () => {
      expect(parseFirstNumber(3.2)).toBe(3.2);
      expect(parseFirstNumber(Number.POSITIVE_INFINITY)).toBeNull();
    });

    it('should return null without digits', () => {
      expect(parseFirstNumber('none')).toBeNull();
      expect(parseFirstNumber('N/A')).toBeNull();
    });
  });

  describe('normalizeReviewCount', () => {
    it('should strip thousands separators', () => {
      expect(normalizeReviewCount('12,345')).toBe(12345);
      expect(normalizeReviewCount('1,234,567 user reviews')).toBe(1234567);
    });

    it('should truncate numeric input', () => {
      expect(normalizeReviewCount(12.7)).toBe(12);
    });

    it('should reject negative numbers and text without digits', () => {
      expect(normalizeReviewCount(-3)).toBeNull();
      expect(normalizeReviewCount('No reviews')).toBeNull();
      expect(normalizeReviewCount(null)).toBeNull();
    });
  });
});
