/**
 * String similarity for "did you mean?" suggestions.
 */

import type { Brand } from '../runtime/brand.js';

/** Similarity score in [0, 1]; 1 means identical */
export type Similarity = Brand<number, 'Similarity'>;

export function similarity(value: number): Similarity {
  return Math.min(1, Math.max(0, value)) as Similarity;
}

export const DEFAULT_SUGGESTION_THRESHOLD = similarity(0.5);

/**
 * Levenshtein edit distance, single-row dynamic programming.
 */
export function levenshteinDistance(a: string, b: string): number {
  if (a.length > b.length) {
    [a, b] = [b, a];
  }
  if (a.length === 0) return b.length;

  let prevRow = Array.from({ length: a.length + 1 }, (_, i) => i);
  let currRow = new Array<number>(a.length + 1).fill(0);

  for (let j = 1; j <= b.length; j++) {
    currRow[0] = j;
    for (let i = 1; i <= a.length; i++) {
      const cost = a[i - 1] === b[j - 1] ? 0 : 1;
      currRow[i] = Math.min(prevRow[i] + 1, currRow[i - 1] + 1, prevRow[i - 1] + cost);
    }
    [prevRow, currRow] = [currRow, prevRow];
  }

  return prevRow[a.length];
}

/**
 * Case-insensitive similarity. A candidate containing the input scores at
 * least 0.75 so partial ids ("loan") still find their trees.
 */
export function computeSimilarity(input: string, candidate: string): Similarity {
  const a = input.toLowerCase();
  const b = candidate.toLowerCase();
  if (a === b) return similarity(1);
  if (a.length === 0 || b.length === 0) return similarity(0);

  const byDistance = 1 - levenshteinDistance(a, b) / Math.max(a.length, b.length);
  return similarity(b.includes(a) ? Math.max(0.75, byDistance) : byDistance);
}

/**
 * Candidates at or above `threshold`, best first; ties sort by name.
 */
export function findClosestMatches(
  input: string,
  candidates: readonly string[],
  limit = 3,
  threshold: Similarity = DEFAULT_SUGGESTION_THRESHOLD
): readonly string[] {
  return candidates
    .map((candidate) => ({ candidate, score: computeSimilarity(input, candidate) }))
    .filter(({ score }) => score >= threshold)
    .sort((x, y) => y.score - x.score || x.candidate.localeCompare(y.candidate))
    .slice(0, limit)
    .map(({ candidate }) => candidate);
}
