/**
 * PeptideMapper - chainable peptide mapping pipeline
 *
 * Each method returns a new mapper with the option applied, so partial
 * pipelines can be shared and specialised. Nothing runs until a terminal
 * method (`stream`, `collect`, `forEach`) is called.
 *
 * @since v0.1.0
 */

import type { ProteinPeptideMap, ProteinSource } from "../types";
import { PeptideMapProcessor } from "./map";
import type { MapOptions } from "./types";

export class PeptideMapper {
  constructor(
    private readonly source: ProteinSource,
    private readonly peptideList: readonly string[] = [],
    private readonly options: MapOptions = {}
  ) {}

  /**
   * Peptides to locate; replaces any earlier list
   */
  peptides(peptides: readonly string[]): PeptideMapper {
    return new PeptideMapper(this.source, [...peptides], this.options);
  }

  /**
   * Maximum substitutions per occurrence
   */
  mismatches(budget: number): PeptideMapper {
    return this.with({ budget });
  }

  /**
   * Number of display rows
   */
  rows(maxRows: number): PeptideMapper {
    return this.with({ layout: { ...this.options.layout, maxRows } });
  }

  /**
   * Residues required between occurrences sharing a row
   */
  gap(minGap: number): PeptideMapper {
    return this.with({ layout: { ...this.options.layout, minGap } });
  }

  /**
   * Also yield proteins without any occurrence
   */
  includeUnmatched(include = true): PeptideMapper {
    return this.with({ includeUnmatched: include });
  }

  verbose(enabled = true): PeptideMapper {
    return this.with({ verbose: enabled });
  }

  /**
   * Stream one result per protein
   *
   * @throws {ConfigurationError} When the budget or layout is invalid
   */
  stream(): AsyncIterable<ProteinPeptideMap> {
    return new PeptideMapProcessor().map(this.source, this.peptideList, this.options);
  }

  async collect(): Promise<ProteinPeptideMap[]> {
    const results: ProteinPeptideMap[] = [];
    for await (const result of this.stream()) {
      results.push(result);
    }
    return results;
  }

  async forEach(fn: (result: ProteinPeptideMap) => void | Promise<void>): Promise<void> {
    for await (const result of this.stream()) {
      await fn(result);
    }
  }

  private with(overrides: MapOptions): PeptideMapper {
    return new PeptideMapper(this.source, this.peptideList, { ...this.options, ...overrides });
  }
}

/**
 * Start a peptide mapping pipeline
 *
 * @example
 * ```typescript
 * const results = await peptideMap({ P1: "MKVLATGKVLPE" })
 *   .peptides(["KVL", "ATG"])
 *   .mismatches(1)
 *   .rows(3)
 *   .collect();
 * ```
 */
export function peptideMap(proteins: ProteinSource): PeptideMapper {
  return new PeptideMapper(proteins);
}

export { aggregateOccurrences, compareOccurrences } from "./aggregate";
export { countMismatches } from "./core/mismatch";
export {
  DEFAULT_LAYOUT_CONFIG,
  DEFAULT_MISMATCH_BUDGET,
  longestPeptideLength,
  resolveLayoutConfig,
  validateBudget,
} from "./core/validation";
export { formatOccurrenceLabel, mismatchLegend } from "./labels";
export { packRows } from "./layout";
export { findOccurrences } from "./locate";
export { iterateProteins, mapPeptides, PeptideMapProcessor } from "./map";
export { summarizeOccurrences } from "./stats";
export type { MapOptions } from "./types";
