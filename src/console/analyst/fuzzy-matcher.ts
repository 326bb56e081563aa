/**
 * Fuzzy Matcher
 *
 * Typo-tolerant lookup of a token against a canonical value list.
 * Distance is optimal string alignment: Levenshtein plus swapping two
 * adjacent characters as a single edit ("Karnatkaa" / "Karnataak").
 */

export interface FuzzyMatch {
  value: string;
  score: number;
}

/**
 * Optimal-string-alignment edit distance
 */
export function editDistance(a: string, b: string): number {
  const matrix: number[][] = [];

  // Initialize matrix
  for (let i = 0; i <= a.length; i++) {
    matrix[i] = [i];
  }
  for (let j = 0; j <= b.length; j++) {
    matrix[0][j] = j;
  }

  // Fill matrix
  for (let i = 1; i <= a.length; i++) {
    for (let j = 1; j <= b.length; j++) {
      const cost = a[i - 1] === b[j - 1] ? 0 : 1;
      let best = Math.min(
        matrix[i - 1][j] + 1, // Deletion
        matrix[i][j - 1] + 1, // Insertion
        matrix[i - 1][j - 1] + cost // Substitution
      );
      if (i > 1 && j > 1 && a[i - 1] === b[j - 2] && a[i - 2] === b[j - 1]) {
        best = Math.min(best, matrix[i - 2][j - 2] + 1); // Transposition
      }
      matrix[i][j] = best;
    }
  }

  return matrix[a.length][b.length];
}

/**
 * Case-insensitive similarity in [0, 1]
 */
export function similarity(a: string, b: string): number {
  const left = a.toLowerCase();
  const right = b.toLowerCase();
  const longest = Math.max(left.length, right.length);
  if (longest === 0) return 1;
  return 1 - editDistance(left, right) / longest;
}

/**
 * Match a token against a canonical list
 *
 * Exact (case-insensitive) hits score 1. Otherwise the most similar entry at
 * or above the threshold wins; equal scores go to the earlier entry.
 *
 * @returns null when nothing reaches the threshold
 */
export function matchValue(token: string, values: readonly string[], threshold: number): FuzzyMatch | null {
  const needle = token.toLowerCase();

  const exact = values.find((v) => v.toLowerCase() === needle);
  if (exact !== undefined) {
    return { value: exact, score: 1 };
  }

  let best: FuzzyMatch | null = null;
  for (const value of values) {
    const score = similarity(needle, value);
    if (score >= threshold && (!best || score > best.score)) {
      best = { value, score };
    }
  }

  return best;
}
