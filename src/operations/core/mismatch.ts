/**
 * Substitution counting between equal-length residue strings
 *
 * @module mismatch
 */

/**
 * Count positions where two strings differ (Hamming distance)
 *
 * Only the overlapping prefix is compared; callers pass equal-length
 * strings. When `limit` is given the scan stops as soon as the count
 * exceeds it, so the result is then `limit + 1` rather than the full
 * distance.
 *
 * @example
 * ```typescript
 * countMismatches("KVI", "KVL");    // 1
 * countMismatches("AAAA", "TTTT", 1); // 2 (stopped early)
 * ```
 */
export function countMismatches(a: string, b: string, limit?: number): number {
  const length = Math.min(a.length, b.length);
  let mismatches = 0;

  for (let i = 0; i < length; i++) {
    if (a.charCodeAt(i) !== b.charCodeAt(i)) {
      mismatches++;
      if (limit !== undefined && mismatches > limit) break;
    }
  }

  return mismatches;
}

/**
 * Hamming distance between `peptide` and the window of `protein` at `offset`
 *
 * Avoids allocating the substring for windows that are rejected.
 */
export function countWindowMismatches(
  peptide: string,
  protein: string,
  offset: number,
  limit: number
): number {
  let mismatches = 0;

  for (let j = 0; j < peptide.length; j++) {
    if (protein.charCodeAt(offset + j) !== peptide.charCodeAt(j)) {
      mismatches++;
      if (mismatches > limit) break;
    }
  }

  return mismatches;
}
