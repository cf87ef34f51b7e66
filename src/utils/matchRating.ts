/**
 * Match Rating Approach (Western Airlines, 1977)
 * Phonetic codex and comparison for short names
 */

const VOWELS_AND_SPACE = 'AEIOU ';

/**
 * Keeps the first letter, drops vowels and spaces after it, collapses doubled consonants,
 * and keeps only the first and last three characters of codes longer than six.
 */
export function matchRatingCodex(s: string): string {
  const upper = s.toUpperCase();
  const codex: string[] = [];
  let previous: string | null = null;

  Array.from(upper).forEach((c, index) => {
    if (index === 0 || (!VOWELS_AND_SPACE.includes(c) && c !== previous)) {
      codex.push(c);
    }
    previous = c;
  });

  if (codex.length > 6) {
    return [...codex.slice(0, 3), ...codex.slice(-3)].join('');
  }

  return codex.join('');
}

function minimumRating(lengthSum: number): number {
  if (lengthSum <= 4) {
    return 5;
  }
  if (lengthSum <= 7) {
    return 4;
  }
  if (lengthSum <= 11) {
    return 3;
  }
  return 2;
}

/**
 * Compares the codexes of both strings. Returns null when the codex lengths differ by three
 * or more, since the algorithm gives no rating in that case.
 */
export function matchRatingComparison(s1: string, s2: string): boolean | null {
  const codex1 = Array.from(matchRatingCodex(s1));
  const codex2 = Array.from(matchRatingCodex(s2));

  if (Math.abs(codex1.length - codex2.length) >= 3) {
    return null;
  }

  const minRating = minimumRating(codex1.length + codex2.length);

  // Strip the common left-to-right characters
  const rest1: string[] = [];
  const rest2: string[] = [];
  for (let i = 0; i < Math.max(codex1.length, codex2.length); i++) {
    const c1: string | undefined = codex1[i];
    const c2: string | undefined = codex2[i];
    if (c1 !== c2) {
      if (c1 !== undefined) {
        rest1.push(c1);
      }
      if (c2 !== undefined) {
        rest2.push(c2);
      }
    }
  }

  // Then the common right-to-left characters of what is left
  const reversed1 = [...rest1].reverse();
  const reversed2 = [...rest2].reverse();
  let unmatched1 = 0;
  let unmatched2 = 0;
  for (let i = 0; i < Math.max(reversed1.length, reversed2.length); i++) {
    const c1: string | undefined = reversed1[i];
    const c2: string | undefined = reversed2[i];
    if (c1 !== c2) {
      if (c1 !== undefined) {
        unmatched1++;
      }
      if (c2 !== undefined) {
        unmatched2++;
      }
    }
  }

  return 6 - Math.max(unmatched1, unmatched2) >= minRating;
}
