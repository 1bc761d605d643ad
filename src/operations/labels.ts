/**
 * Text labels for occurrences and mismatch levels
 *
 * Wording follows the labels peptide figures traditionally carry; colour
 * and placement are left to the renderer.
 */

import type { Occurrence } from "../types";
import { mismatchLevelCount, validateBudget } from "./core/validation";

/**
 * Label for one occurrence bar
 *
 * @example
 * ```typescript
 * formatOccurrenceLabel({ peptide: "KVI", start: 2, end: 4, mismatches: 1, matchedText: "KVL" });
 * // "KVI (1 mut) [2-4]"
 * ```
 */
export function formatOccurrenceLabel(occurrence: Occurrence): string {
  const mutations = occurrence.mismatches > 0 ? ` (${occurrence.mismatches} mut)` : "";
  return `${occurrence.peptide}${mutations} [${occurrence.start}-${occurrence.end}]`;
}

/**
 * Legend entries for each mismatch level up to `budget`
 *
 * Index k describes occurrences with k mismatches. Levels above
 * `maxPeptideLength` cannot occur and are left out.
 */
export function mismatchLegend(budget: number, maxPeptideLength: number): string[] {
  validateBudget(budget);

  const levels = mismatchLevelCount(budget, maxPeptideLength);
  const entries = ["Exact Match"];
  for (let k = 1; k < levels; k++) {
    entries.push(`${k} Mutation${k > 1 ? "s" : ""}`);
  }
  return entries;
}
