/**
 * Approximate peptide location within a protein
 *
 * Slides a window the length of the peptide across the protein one residue
 * at a time and keeps every window whose substitution count is within the
 * mismatch budget. Only substitutions are tolerated, so every occurrence
 * spans exactly `peptide.length` residues.
 *
 * @since v0.1.0
 */

import type { Occurrence } from "../types";
import { countWindowMismatches } from "./core/mismatch";
import { validateBudget } from "./core/validation";

/**
 * Find every occurrence of `peptide` in `protein` with at most `budget`
 * substitutions
 *
 * Occurrences come back in ascending `start` order. Overlapping hits are
 * all kept; nothing is deduplicated.
 *
 * @param peptide - Peptide residues
 * @param protein - Protein residues
 * @param budget - Maximum substitutions per occurrence
 * @returns Occurrences with 1-based inclusive coordinates
 * @throws {ConfigurationError} When budget is negative or not an integer
 *
 * @example
 * ```typescript
 * findOccurrences("KVI", "MKVLATG", 1);
 * // [{ peptide: "KVI", start: 2, end: 4, mismatches: 1, matchedText: "KVL" }]
 * ```
 */
export function findOccurrences(peptide: string, protein: string, budget: number): Occurrence[] {
  validateBudget(budget);
  return scanProtein(peptide, protein, budget);
}

/**
 * Sliding-window scan without parameter validation
 *
 * @internal
 */
export function scanProtein(peptide: string, protein: string, budget: number): Occurrence[] {
  const occurrences: Occurrence[] = [];

  if (peptide.length === 0 || peptide.length > protein.length) {
    return occurrences;
  }

  const lastOffset = protein.length - peptide.length;
  for (let i = 0; i <= lastOffset; i++) {
    const mismatches = countWindowMismatches(peptide, protein, i, budget);

    if (mismatches <= budget) {
      occurrences.push({
        peptide,
        start: i + 1,
        end: i + peptide.length,
        mismatches,
        matchedText: protein.substring(i, i + peptide.length),
      });
    }
  }

  return occurrences;
}
