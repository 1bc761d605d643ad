/**
 * Parameter validation shared by the matcher, aggregator and row packer
 *
 * Every check throws ConfigurationError naming the rejected parameter,
 * before any matching or packing work begins.
 */

import { type } from "arktype";
import { ConfigurationError } from "../../errors";
import type { LayoutConfig } from "../../types";
import { MaxRowsSchema, MinGapSchema, MismatchBudgetSchema } from "../../types";

export const DEFAULT_LAYOUT_CONFIG: LayoutConfig = {
  maxRows: 2,
  minGap: 10,
};

export const DEFAULT_MISMATCH_BUDGET = 0;

/**
 * Validate a mismatch budget
 *
 * @throws {ConfigurationError} When budget is negative or not an integer
 */
export function validateBudget(budget: number): number {
  const result = MismatchBudgetSchema(budget);
  if (result instanceof type.errors) {
    throw new ConfigurationError(result.summary, "budget", budget);
  }
  return result;
}

/**
 * Number of reachable mismatch levels, 0 through the effective budget
 *
 * A peptide cannot differ from its window in more positions than it has,
 * so levels above the longest peptide length never occur.
 */
export function mismatchLevelCount(budget: number, maxPeptideLength: number): number {
  return Math.min(budget, Math.max(maxPeptideLength, 0)) + 1;
}

/**
 * Length of the longest peptide, 0 for none
 */
export function longestPeptideLength(peptides: Iterable<string>): number {
  let longest = 0;
  for (const peptide of peptides) {
    longest = Math.max(longest, peptide.length);
  }
  return longest;
}

/**
 * Merge a partial layout over the defaults and validate every field
 *
 * @throws {ConfigurationError} When maxRows or minGap is out of range
 */
export function resolveLayoutConfig(config: Partial<LayoutConfig> = {}): LayoutConfig {
  const merged = {
    maxRows: config.maxRows ?? DEFAULT_LAYOUT_CONFIG.maxRows,
    minGap: config.minGap ?? DEFAULT_LAYOUT_CONFIG.minGap,
  };

  const maxRows = MaxRowsSchema(merged.maxRows);
  if (maxRows instanceof type.errors) {
    throw new ConfigurationError(maxRows.summary, "maxRows", merged.maxRows);
  }

  const minGap = MinGapSchema(merged.minGap);
  if (minGap instanceof type.errors) {
    throw new ConfigurationError(minGap.summary, "minGap", merged.minGap);
  }

  return { maxRows, minGap };
}
