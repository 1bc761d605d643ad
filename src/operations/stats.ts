/**
 * Match statistics for one protein
 */

import type { MatchSummary, Occurrence } from "../types";
import { longestPeptideLength, mismatchLevelCount, validateBudget } from "./core/validation";

/**
 * Count occurrences overall, per mismatch level and per distinct peptide
 *
 * The histogram has one entry per level from 0 to `budget`, capped at
 * `maxPeptideLength` (by default the longest peptide among the
 * occurrences), so levels with no occurrences still appear.
 *
 * @throws {ConfigurationError} When budget is negative or not an integer
 */
export function summarizeOccurrences(
  occurrences: readonly Occurrence[],
  budget: number,
  maxPeptideLength: number = longestPeptideLength(occurrences.map((o) => o.peptide))
): MatchSummary {
  validateBudget(budget);

  const histogram = new Array<number>(mismatchLevelCount(budget, maxPeptideLength)).fill(0);
  const peptides = new Set<string>();

  for (const occurrence of occurrences) {
    // Occurrences from another budget may exceed this histogram
    if (occurrence.mismatches < histogram.length) {
      histogram[occurrence.mismatches]++;
    }
    peptides.add(occurrence.peptide);
  }

  return {
    totalOccurrences: occurrences.length,
    exactOccurrences: histogram[0],
    mismatchHistogram: histogram,
    matchedPeptides: peptides.size,
  };
}
