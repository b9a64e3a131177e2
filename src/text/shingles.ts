/**
 * Shingle construction: fixed-length overlapping word sequences.
 */

/** Separator between words inside a shingle */
export const SHINGLE_JOINER = " ";

/**
 * Build the set of n-word shingles for a token sequence.
 *
 * Each shingle covers the window [i, i + n) — exactly n tokens.
 * Fewer than n tokens yields an empty set.
 */
export function buildShingles(tokens: readonly string[], n: number): Set<string> {
  const shingles = new Set<string>();
  for (let i = 0; i + n <= tokens.length; i++) {
    shingles.add(tokens.slice(i, i + n).join(SHINGLE_JOINER));
  }
  return shingles;
}

/**
 * Upper bound on the number of distinct shingles for t tokens.
 */
export function maxShingleCount(tokenCount: number, n: number): number {
  return Math.max(0, tokenCount - n + 1);
}
