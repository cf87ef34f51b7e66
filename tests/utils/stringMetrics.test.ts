import {
  clean,
  damerauLevenshteinDistance,
  distance,
  hammingDistance,
  isNumeric,
  jaro,
  jaroWinkler,
  levenshteinDistance,
  longestCommonSubsequence,
  longestCommonSubstring,
  match,
  normalize,
  removeKeywords,
  roundTo,
  similarity
} from '../../src/utils/stringMetrics';

describe('stringMetrics', () => {
  describe('normalize', () => {
    it('should fold accents and separators to lowercase words', () => {
      expect(normalize('Café-Bar_1')).toBe('cafe bar 1');
    });

    it('should remove the cedex keyword and collapse whitespace', () => {
      expect(normalize('Paris  CEDEX 01')).toBe('paris 01');
    });

    it('should be idempotent', () => {
      const once = normalize('  Hôtel*de.la {Gare}!  ');
      expect(once).toBe('hotel de la gare');
      expect(normalize(once)).toBe(once);
    });
  });

  describe('removeKeywords', () => {
    it('should remove keywords case-sensitively', () => {
      expect(removeKeywords('Lyon Cedex 03')).toBe('Lyon 03');
    });

    it('should lowercase first when asked', () => {
      expect(removeKeywords('LYON CEDEX', ['cedex'], true)).toBe('lyon');
    });

    it('should use a custom keyword list', () => {
      expect(removeKeywords('12 rue bis bis', ['bis'])).toBe('12 rue');
    });
  });

  describe('clean', () => {
    it('should fold to ASCII, strip quotes and lowercase', () => {
      expect(clean('  "Hôtel"\n ')).toBe('hotel');
    });

    it('should transliterate ligatures, sharp s and other scripts', () => {
      expect(clean('Straße')).toBe('strasse');
      expect(clean('Œuvre')).toBe('oeuvre');
      expect(clean('Москва')).toBe('moskva');
    });

    it('should return null when nothing is left', () => {
      expect(clean('   ')).toBeNull();
    });
  });

  describe('isNumeric', () => {
    it.each([
      ['0612345678', true],
      ['1e5', true],
      ['0x1F', true],
      ['-3.5', true],
      ['+33 6', false],
      ['', false],
      ['abc', false]
    ])('should classify %p as %p', (input, expected) => {
      expect(isNumeric(input)).toBe(expected);
    });
  });

  describe('longestCommonSubsequence', () => {
    it('should extract the longest common subsequence', () => {
      expect(longestCommonSubsequence('AGGTAB', 'GXTXAYB')).toBe('GTAB');
    });

    it('should move up on ties while backtracking', () => {
      expect(longestCommonSubsequence('ab', 'ba')).toBe('a');
    });

    it('should return an empty string when nothing is shared', () => {
      expect(longestCommonSubsequence('abc', 'xyz')).toBe('');
    });
  });

  describe('longestCommonSubstring', () => {
    it('should return the longest contiguous run', () => {
      expect(longestCommonSubstring('ABABC', 'BABCA')).toBe('BABC');
    });

    it('should keep the first maximal run on ties', () => {
      expect(longestCommonSubstring('abXcd', 'cdYab')).toBe('ab');
    });
  });

  describe('levenshteinDistance', () => {
    it('should compute distance and ratio', () => {
      const result = levenshteinDistance('kitten', 'sitting');
      expect(result.distance).toBe(3);
      expect(result.ratio).toBeCloseTo(10 / 13, 10);
    });

    it('should give zeros for an empty input', () => {
      expect(levenshteinDistance('', 'abc')).toEqual({ distance: 0, ratio: 0 });
    });

    it('should ignore accents when normalizing', () => {
      expect(levenshteinDistance('café', 'cafe')).toEqual({ distance: 0, ratio: 1 });
    });

    it('should compare transliterated forms', () => {
      expect(levenshteinDistance('Straße', 'Strasse')).toEqual({ distance: 0, ratio: 1 });
    });
  });

  describe('other edit distances', () => {
    it('should count an adjacent transposition once', () => {
      expect(damerauLevenshteinDistance('ca', 'ac')).toBe(1);
    });

    it('should count mismatches and length difference', () => {
      expect(hammingDistance('karolin', 'kathrin')).toBe(3);
      expect(hammingDistance('abc', 'abcde')).toBe(2);
    });
  });

  describe('jaro and jaroWinkler', () => {
    it('should score MARTHA and MARHTA', () => {
      expect(jaro('MARTHA', 'MARHTA')).toBeCloseTo(0.9444, 4);
      expect(jaroWinkler('MARTHA', 'MARHTA')).toBeCloseTo(0.9611, 4);
    });

    it('should give 0 for an empty string', () => {
      expect(jaro('', 'abc')).toBe(0);
    });
  });

  describe('distance', () => {
    it('should return a zero ratio for a missing operand', () => {
      expect(distance(null, 'abc')).toEqual({ label: '', ratio: 0 });
    });

    it('should compute the levenshtein ratio', () => {
      expect(distance('kitten', 'sitting', 'levenshtein').ratio).toBeCloseTo(10 / 13, 10);
      expect(distance('abc', 'abc', 'levenshtein')).toEqual({ label: 'abc', ratio: 1 });
    });
  });

  describe('match', () => {
    it('should compare by match rating', () => {
      expect(match('Byrne', 'Boern')).toBe(true);
      expect(match('Smith', 'Jones')).toBe(false);
      expect(match(null, 'Jones')).toBe(false);
    });
  });

  describe('similarity', () => {
    it('should reward a query contained in the candidate in LCS mode', () => {
      expect(similarity('Musee Grevin', 'Musée Grévin Paris', true)).toBe(1);
    });

    it('should use the plain levenshtein ratio otherwise', () => {
      expect(similarity('Musee Grevin', 'Musée Grévin Paris', false)).toBeCloseTo(0.8, 10);
    });

    it('should give a perfect score for identical strings', () => {
      expect(similarity('Place du Tertre', 'Place du Tertre')).toBe(1);
    });

    it.each([
      ['Москва', false],
      ['東京', false],
      ['Αθήνα', true]
    ])('should give a perfect score for %p compared with itself (lcs %p)', (text, lcs) => {
      expect(similarity(text, text, lcs)).toBe(1);
    });

    it('should be 0 when one side is empty', () => {
      expect(similarity('', 'Paris')).toBe(0);
    });
  });

  it('should round to the given decimals', () => {
    expect(roundTo(0.8333)).toBe(0.83);
    expect(roundTo(0.96111, 4)).toBe(0.9611);
  });
});
