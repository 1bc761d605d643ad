/**
 * PeptideMapProcessor - per-protein peptide mapping pipeline
 *
 * For each protein: aggregate the occurrences of every peptide, pack them
 * into display rows and summarise them. Proteins are independent of each
 * other, so results stream out one protein at a time.
 *
 * @since v0.1.0
 */

import type {
  AbstractSequence,
  LayoutConfig,
  ProteinPeptideMap,
  ProteinSource,
} from "../types";
import { aggregateOccurrences } from "./aggregate";
import {
  DEFAULT_MISMATCH_BUDGET,
  longestPeptideLength,
  resolveLayoutConfig,
  validateBudget,
} from "./core/validation";
import { packRows } from "./layout";
import { summarizeOccurrences } from "./stats";
import type { MapOptions } from "./types";

/**
 * Processor for mapping peptides onto proteins
 *
 * @example
 * ```typescript
 * const processor = new PeptideMapProcessor();
 * const proteins = new Map([["P1", "MKVLATGKVLPE"]]);
 *
 * for await (const result of processor.map(proteins, ["KVL"], { budget: 1 })) {
 *   console.log(`${result.proteinId}: ${result.summary.totalOccurrences} matches`);
 * }
 * ```
 */
export class PeptideMapProcessor {
  /**
   * Map peptides onto every protein in the source
   *
   * Configuration is validated before the first protein is read.
   *
   * @param source - Proteins to search
   * @param peptides - Peptides to locate, in label order
   * @param options - Mapping options
   * @yields One result per protein, in source order
   * @throws {ConfigurationError} When budget or layout is invalid
   */
  async *map(
    source: ProteinSource,
    peptides: readonly string[],
    options: MapOptions = {}
  ): AsyncIterable<ProteinPeptideMap> {
    const budget = validateBudget(options.budget ?? DEFAULT_MISMATCH_BUDGET);
    const layout = resolveLayoutConfig(options.layout);
    const verbose = options.verbose === true;
    const maxPeptideLength = longestPeptideLength(peptides);

    this.warnOnSuspiciousPeptides(peptides);

    if (verbose) {
      console.log(`Searching ${peptides.length} peptides with ${budget} mutations allowed`);
    }

    let proteinCount = 0;
    let mappedCount = 0;

    for await (const protein of iterateProteins(source)) {
      proteinCount++;
      if (verbose) {
        console.log(`Processing ${protein.id} (${protein.sequence.length} aa)`);
      }

      const result = this.mapProtein(protein, peptides, budget, maxPeptideLength, layout);

      if (verbose) {
        console.log(`  Found ${result.occurrences.length} peptide matches`);
      }

      if (result.occurrences.length === 0 && options.includeUnmatched !== true) {
        continue;
      }

      mappedCount++;
      yield result;
    }

    if (verbose) {
      console.log(`Mapped ${mappedCount} of ${proteinCount} proteins`);
    }
  }

  /**
   * Run the full pipeline for a single protein
   */
  private mapProtein(
    protein: AbstractSequence,
    peptides: readonly string[],
    budget: number,
    maxPeptideLength: number,
    layout: LayoutConfig
  ): ProteinPeptideMap {
    const occurrences = aggregateOccurrences(peptides, protein.sequence, budget);

    return {
      proteinId: protein.id,
      proteinLength: protein.sequence.length,
      occurrences,
      layout: packRows(occurrences, layout),
      summary: summarizeOccurrences(occurrences, budget, maxPeptideLength),
    };
  }

  /**
   * Matching is exact and case-sensitive; flag peptides that will likely
   * never match uppercase protein residues
   */
  private warnOnSuspiciousPeptides(peptides: readonly string[]): void {
    for (const peptide of peptides) {
      if (/\s/.test(peptide)) {
        console.warn(`Peptide "${peptide}" contains whitespace and may not match`);
      } else if (peptide !== peptide.toUpperCase()) {
        console.warn(`Peptide "${peptide}" contains lowercase residues; matching is case-sensitive`);
      }
    }
  }
}

/**
 * Map peptides onto all proteins and collect the results
 *
 * @throws {ConfigurationError} When budget or layout is invalid
 */
export async function mapPeptides(
  source: ProteinSource,
  peptides: readonly string[],
  options: MapOptions = {}
): Promise<ProteinPeptideMap[]> {
  const results: ProteinPeptideMap[] = [];
  for await (const result of new PeptideMapProcessor().map(source, peptides, options)) {
    results.push(result);
  }
  return results;
}

// =============================================================================
// PROTEIN SOURCE NORMALISATION
// =============================================================================

/**
 * Iterate any supported protein source as sequences
 */
export async function* iterateProteins(source: ProteinSource): AsyncIterable<AbstractSequence> {
  if (isProteinMap(source)) {
    for (const [id, sequence] of source.entries()) {
      yield toSequence(id, sequence);
    }
    return;
  }

  if (isAsyncSequenceIterable(source)) {
    yield* source;
    return;
  }

  if (isSequenceIterable(source)) {
    yield* source;
    return;
  }

  for (const [id, sequence] of Object.entries(source)) {
    yield toSequence(id, sequence);
  }
}

function toSequence(id: string, sequence: string): AbstractSequence {
  return { id, sequence, length: sequence.length };
}

/**
 * Maps are recognised by shape so read-only views that are not `Map`
 * instances still read as identifier to residues. A record whose keys
 * happen to be "get" or "entries" holds strings, not functions.
 */
function isProteinMap(source: ProteinSource): source is ReadonlyMap<string, string> {
  return (
    "get" in source &&
    typeof source.get === "function" &&
    "entries" in source &&
    typeof source.entries === "function"
  );
}

function isAsyncSequenceIterable(
  source: ProteinSource
): source is AsyncIterable<AbstractSequence> {
  return Symbol.asyncIterator in source;
}

function isSequenceIterable(source: ProteinSource): source is Iterable<AbstractSequence> {
  return Symbol.iterator in source;
}
