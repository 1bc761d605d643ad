/**
 * Occurrence aggregation across a peptide list
 *
 * Runs the matcher for each peptide against one protein and orders the
 * union for the row packer.
 */

import type { Occurrence } from "../types";
import { validateBudget } from "./core/validation";
import { scanProtein } from "./locate";

/**
 * Packing order: start ascending, then shorter spans first
 */
export function compareOccurrences(a: Occurrence, b: Occurrence): number {
  if (a.start !== b.start) {
    return a.start - b.start;
  }
  return a.end - a.start - (b.end - b.start);
}

/**
 * Find all peptides in one protein and return the occurrences in packing order
 *
 * Ties on both keys keep peptide-list order (the sort is stable). Two
 * peptides matching the same span both appear.
 *
 * @throws {ConfigurationError} When budget is negative or not an integer
 */
export function aggregateOccurrences(
  peptides: Iterable<string>,
  protein: string,
  budget: number
): Occurrence[] {
  validateBudget(budget);

  const occurrences: Occurrence[] = [];
  for (const peptide of peptides) {
    for (const occurrence of scanProtein(peptide, protein, budget)) {
      occurrences.push(occurrence);
    }
  }

  return occurrences.sort(compareOccurrences);
}
