/**
 * String normalization and similarity metrics
 * Used to match free-text queries against geocoder candidates
 */

import { transliterate } from 'transliteration';
import { matchRatingComparison } from './matchRating';

export const DEFAULT_KEYWORDS = ['cedex', 'Cedex', 'CEDEX'] as const;

// Applied in order; accented letters fold to their base letter, separators become a space
const CHARACTER_TABLE: ReadonlyArray<[string, string]> = [
  ['é', 'e'],
  ['è', 'e'],
  ['ê', 'e'],
  ['à', 'a'],
  ['ù', 'u'],
  ['û', 'u'],
  ['ç', 'c'],
  ['ô', 'o'],
  ['î', 'i'],
  ['ï', 'i'],
  ['â', 'a'],
  ['-', ' '],
  ['*', ' '],
  ['.', ' '],
  ['_', ' '],
  ['{', ''],
  ['}', ''],
  ['!', '']
];

export type DistanceMetric = 'levenshtein' | 'damerau-levenshtein' | 'hamming' | 'jaro' | 'jaro-winkler';

export interface LevenshteinResult {
  distance: number;
  ratio: number;
}

export interface DistanceResult {
  label: string;
  ratio: number;
}

export function removeRedundantWhitespaces(s: string): string {
  return s.replace(/\s+/g, ' ').trim();
}

export function replaceCharacters(s: string): string {
  return CHARACTER_TABLE.reduce((out, [from, to]) => out.split(from).join(to), s);
}

/**
 * Removes every occurrence of the keywords (case-sensitive), repeating until none is left,
 * then collapses whitespace.
 */
export function removeKeywords(
  input: string,
  keywords: readonly string[] = DEFAULT_KEYWORDS,
  toLower = false
): string {
  let output = toLower ? input.toLowerCase() : input;

  if (input.length > 1) {
    for (const keyword of keywords) {
      while (keyword.length > 0 && output.includes(keyword)) {
        output = output.split(keyword).join('');
      }
    }
  }

  return removeRedundantWhitespaces(output);
}

export function normalize(s: string, keywords: readonly string[] = DEFAULT_KEYWORDS): string {
  return removeRedundantWhitespaces(removeKeywords(replaceCharacters(s.toLowerCase()), keywords));
}

/** Transliterates to ASCII, strips quotes and lowercases. Returns null when nothing is left. */
export function clean(s: string): string | null {
  const cleaned = toAscii(s)
    .replace(/\n/g, ' ')
    .replace(/ {2,}/g, ' ')
    .trim()
    .replace(/^["']+|["']+$/g, '')
    .toLowerCase()
    .trim();

  return cleaned.length > 0 ? cleaned : null;
}

// ß becomes ss, Œ becomes OE, Cyrillic and Greek are romanized
export function toAscii(s: string): string {
  return transliterate(s);
}

export function isNumeric(literal: string): boolean {
  const s = literal.trim();
  if (s.length === 0) {
    return false;
  }

  return /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/.test(s)
    || /^[+-]?0[xX][0-9a-fA-F]+$/.test(s)
    || /^[+-]?0[oO][0-7]+$/.test(s)
    || /^[+-]?0[bB][01]+$/.test(s);
}

/**
 * Longest common subsequence of `a` and `b`.
 * Backtracks from the bottom-right cell; when the up and left cells tie, the walk moves up.
 */
export function longestCommonSubsequence(a: string, b: string): string {
  const lengths: number[][] = Array.from({ length: a.length + 1 }, () => new Array<number>(b.length + 1).fill(0));

  for (let i = 0; i < a.length; i++) {
    for (let j = 0; j < b.length; j++) {
      lengths[i + 1][j + 1] = a[i] === b[j]
        ? lengths[i][j] + 1
        : Math.max(lengths[i + 1][j], lengths[i][j + 1]);
    }
  }

  const chars: string[] = [];
  let i = a.length;
  let j = b.length;

  while (i > 0 && j > 0) {
    if (a[i - 1] === b[j - 1]) {
      chars.push(a[i - 1]);
      i--;
      j--;
    } else if (lengths[i - 1][j] >= lengths[i][j - 1]) {
      i--;
    } else {
      j--;
    }
  }

  return removeRedundantWhitespaces(chars.reverse().join(''));
}

/**
 * Longest contiguous run shared by `s1` and `s2`.
 * Only a strictly longer run replaces the current one, so the first maximal run found wins.
 */
export function longestCommonSubstring(s1: string, s2: string): string {
  let previous = new Array<number>(s2.length + 1).fill(0);
  let longest = 0;
  let xLongest = 0;

  for (let x = 1; x <= s1.length; x++) {
    const current = new Array<number>(s2.length + 1).fill(0);
    for (let y = 1; y <= s2.length; y++) {
      if (s1[x - 1] === s2[y - 1]) {
        current[y] = previous[y - 1] + 1;
        if (current[y] > longest) {
          longest = current[y];
          xLongest = x;
        }
      }
    }
    previous = current;
  }

  return removeRedundantWhitespaces(s1.slice(xLongest - longest, xLongest));
}

function editDistance(s1: string, s2: string): number {
  let previous = Array.from({ length: s2.length + 1 }, (_, j) => j);

  for (let i = 1; i <= s1.length; i++) {
    const current = [i];
    for (let j = 1; j <= s2.length; j++) {
      const cost = s1[i - 1] === s2[j - 1] ? 0 : 1;
      current[j] = Math.min(
        previous[j] + 1,
        current[j - 1] + 1,
        previous[j - 1] + cost
      );
    }
    previous = current;
  }

  return previous[s2.length];
}

/**
 * Edit distance with unit costs and the ratio `(|s1| + |s2| - distance) / (|s1| + |s2|)`.
 * With `normalizeInput`, both strings are transliterated to ASCII first; when that leaves
 * either side empty, the raw strings are compared instead.
 * An empty input gives `{ distance: 0, ratio: 0 }`.
 */
export function levenshteinDistance(token1: string, token2: string, normalizeInput = true): LevenshteinResult {
  if (token1.length === 0 || token2.length === 0) {
    return { distance: 0, ratio: 0 };
  }

  let s1 = token1;
  let s2 = token2;
  if (normalizeInput) {
    const folded1 = toAscii(token1);
    const folded2 = toAscii(token2);
    if (folded1.length > 0 && folded2.length > 0) {
      s1 = folded1;
      s2 = folded2;
    }
  }

  const lensum = s1.length + s2.length;

  const distance = editDistance(s1, s2);
  return { distance, ratio: (lensum - distance) / lensum };
}

// Optimal string alignment: adjacent transpositions count as one edit
export function damerauLevenshteinDistance(s1: string, s2: string): number {
  const d: number[][] = Array.from({ length: s1.length + 1 }, (_, i) =>
    Array.from({ length: s2.length + 1 }, (_, j) => (i === 0 ? j : j === 0 ? i : 0))
  );

  for (let i = 1; i <= s1.length; i++) {
    for (let j = 1; j <= s2.length; j++) {
      const cost = s1[i - 1] === s2[j - 1] ? 0 : 1;
      d[i][j] = Math.min(d[i - 1][j] + 1, d[i][j - 1] + 1, d[i - 1][j - 1] + cost);
      if (i > 1 && j > 1 && s1[i - 1] === s2[j - 2] && s1[i - 2] === s2[j - 1]) {
        d[i][j] = Math.min(d[i][j], d[i - 2][j - 2] + 1);
      }
    }
  }

  return d[s1.length][s2.length];
}

export function hammingDistance(s1: string, s2: string): number {
  let distance = Math.abs(s1.length - s2.length);
  const shortest = Math.min(s1.length, s2.length);

  for (let i = 0; i < shortest; i++) {
    if (s1[i] !== s2[i]) {
      distance++;
    }
  }

  return distance;
}

export function jaro(s1: string, s2: string): number {
  if (s1.length === 0 || s2.length === 0) {
    return 0;
  }

  const window = Math.max(Math.floor(Math.max(s1.length, s2.length) / 2) - 1, 0);
  const s1Matches = new Array<boolean>(s1.length).fill(false);
  const s2Matches = new Array<boolean>(s2.length).fill(false);
  let matches = 0;

  for (let i = 0; i < s1.length; i++) {
    const start = Math.max(0, i - window);
    const end = Math.min(i + window + 1, s2.length);

    for (let j = start; j < end; j++) {
      if (!s2Matches[j] && s1[i] === s2[j]) {
        s1Matches[i] = true;
        s2Matches[j] = true;
        matches++;
        break;
      }
    }
  }

  if (matches === 0) {
    return 0;
  }

  let transpositions = 0;
  let k = 0;
  for (let i = 0; i < s1.length; i++) {
    if (!s1Matches[i]) {
      continue;
    }
    while (!s2Matches[k]) {
      k++;
    }
    if (s1[i] !== s2[k]) {
      transpositions++;
    }
    k++;
  }

  const m = matches;
  return (m / s1.length + m / s2.length + (m - transpositions / 2) / m) / 3;
}

export function jaroWinkler(s1: string, s2: string, prefixScale = 0.1): number {
  const similarity = jaro(s1, s2);

  let prefix = 0;
  const maxPrefix = Math.min(4, s1.length, s2.length);
  while (prefix < maxPrefix && s1[prefix] === s2[prefix]) {
    prefix++;
  }

  return similarity + prefix * prefixScale * (1 - similarity);
}

/**
 * Ratio between `s1` (or its LCS against `s2` when `lcs` is set) and `s2` under the given metric.
 * Edit-distance metrics use `(|s1| + |s2| - d) / (|s1| + |s2|)`.
 */
export function distance(
  s1: string | null,
  s2: string | null,
  metric: DistanceMetric = 'jaro-winkler',
  lcs = false
): DistanceResult {
  if (s1 === null || s2 === null) {
    return { label: s1 ?? '', ratio: 0 };
  }

  const l = s1.length + s2.length;
  const s3 = lcs ? longestCommonSubsequence(s2, s1) : s1;
  const byEdits = (d: number): number => (l === 0 ? 0 : (l - d) / l);

  switch (metric) {
    case 'levenshtein':
      return { label: s1, ratio: byEdits(editDistance(s3, s2)) };
    case 'damerau-levenshtein':
      return { label: s1, ratio: byEdits(damerauLevenshteinDistance(s3, s2)) };
    case 'hamming':
      return { label: s1, ratio: byEdits(hammingDistance(s3, s2)) };
    case 'jaro':
      return { label: s1, ratio: jaro(s3, s2) };
    case 'jaro-winkler':
      return { label: s1, ratio: jaroWinkler(s3, s2) };
    default: {
      const unknown: never = metric;
      throw new Error(`Unsupported distance metric: ${String(unknown)}`);
    }
  }
}

/** Match-rating comparison of `s1` (or its LCS against `s2`) with `s2`. */
export function match(s1: string | null, s2: string | null, lcs = false): boolean {
  if (s1 === null || s2 === null) {
    return false;
  }

  const s3 = lcs ? longestCommonSubsequence(s2, s1) : s1;
  return matchRatingComparison(s3, s2) === true;
}

/**
 * Levenshtein ratio between the normalized strings.
 * In LCS mode the shorter string is extracted as a subsequence of the longer one and compared
 * with that extraction, which rewards abbreviations and partial matches.
 */
export function similarity(left: string, right: string, lcs = false): number {
  const s1 = normalize(left);
  const s2 = normalize(right);

  if (!lcs) {
    return levenshteinDistance(s1, s2).ratio;
  }

  if (s1.length <= s2.length) {
    return levenshteinDistance(longestCommonSubsequence(s1, s2), s1).ratio;
  }

  return levenshteinDistance(longestCommonSubsequence(s2, s1), s2).ratio;
}

export function roundTo(value: number, decimals = 2): number {
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
}
