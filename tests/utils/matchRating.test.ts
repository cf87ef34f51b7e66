import { matchRatingCodex, matchRatingComparison } from '../../src/utils/matchRating';

describe('matchRating', () => {
  describe('matchRatingCodex', () => {
    it('should drop vowels after the first letter', () => {
      expect(matchRatingCodex('Byrne')).toBe('BYRN');
      expect(matchRatingCodex('Catherine')).toBe('CTHRN');
    });

    it('should keep a leading vowel', () => {
      expect(matchRatingCodex('Alan')).toBe('ALN');
    });

    it('should keep the first and last three characters of long codes', () => {
      expect(matchRatingCodex('Schwarzenegger')).toBe('SCHNGR');
    });
  });

  describe('matchRatingComparison', () => {
    it('should match similar sounding names', () => {
      expect(matchRatingComparison('Byrne', 'Boern')).toBe(true);
    });

    it('should reject different names', () => {
      expect(matchRatingComparison('Smith', 'Jones')).toBe(false);
    });

    it('should give no rating when codex lengths differ by three or more', () => {
      expect(matchRatingComparison('A', 'Abcdefgh')).toBeNull();
    });
  });
});
