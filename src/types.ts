/**
 * Core type definitions for peptide mapping
 *
 * Proteins and peptides are plain strings owned by the caller; everything
 * the library produces is a read-only record.
 */

import { type } from "arktype";

/**
 * A protein as handed over by the caller's input adapter
 */
export interface AbstractSequence {
  /** Sequence identifier */
  readonly id: string;
  /** Residues, uppercase amino-acid letters */
  readonly sequence: string;
  /** Cached sequence length */
  readonly length: number;
}

/**
 * Anything that can supply proteins to the mapping pipeline
 *
 * Maps and records are read as identifier to residues, in insertion order.
 */
export type ProteinSource =
  | Iterable<AbstractSequence>
  | AsyncIterable<AbstractSequence>
  | ReadonlyMap<string, string>
  | Readonly<Record<string, string>>;

/**
 * One approximate match of a peptide within a protein
 *
 * Coordinates are 1-based and inclusive: `end - start + 1 === peptide.length`.
 */
export interface Occurrence {
  /** Peptide that was searched for; doubles as its label */
  readonly peptide: string;
  /** First residue of the match (1-based) */
  readonly start: number;
  /** Last residue of the match (1-based, inclusive) */
  readonly end: number;
  /** Substituted residues between peptide and matchedText */
  readonly mismatches: number;
  /** Protein substring at [start, end] */
  readonly matchedText: string;
}

/**
 * Display rows produced by the row packer
 *
 * `rows.length` always equals the configured `maxRows`. Within a row,
 * occurrences keep the order they were packed in (ascending start).
 */
export interface RowAssignment {
  readonly rows: ReadonlyArray<ReadonlyArray<Occurrence>>;
  /** Occurrences placed by the overflow rule, overlapping their row */
  readonly overflowCount: number;
}

export interface LayoutConfig {
  /** Number of display rows, always at least 1 */
  readonly maxRows: number;
  /** Residues that must separate consecutive occurrences in a row */
  readonly minGap: number;
}

/**
 * Per-protein match counts
 */
export interface MatchSummary {
  readonly totalOccurrences: number;
  readonly exactOccurrences: number;
  /** Index k holds the number of occurrences with k mismatches, k = 0..budget */
  readonly mismatchHistogram: readonly number[];
  /** Distinct peptides with at least one occurrence */
  readonly matchedPeptides: number;
}

/**
 * Everything a renderer needs for one protein
 */
export interface ProteinPeptideMap {
  readonly proteinId: string;
  readonly proteinLength: number;
  /** Sorted by start, then by span length */
  readonly occurrences: readonly Occurrence[];
  readonly layout: RowAssignment;
  readonly summary: MatchSummary;
}

// =============================================================================
// ARKTYPE SCHEMAS
// =============================================================================

const NonNegativeInteger = type("number>=0").narrow(
  (value, ctx) => Number.isInteger(value) || ctx.mustBe("an integer")
);

/**
 * Maximum tolerated substitutions per occurrence
 */
export const MismatchBudgetSchema = NonNegativeInteger;

/**
 * Row count for the packed layout
 */
export const MaxRowsSchema = type("number>=1").narrow(
  (value, ctx) => Number.isInteger(value) || ctx.mustBe("an integer")
);

/**
 * Required spacing between occurrences sharing a row
 */
export const MinGapSchema = NonNegativeInteger;

/**
 * File path validation; returns the path with separators normalised
 */
export const FilePathSchema = type("string>0")
  .narrow((path, ctx) => {
    if (path.includes("\0")) {
      return ctx.reject({
        expected: "a path without null characters",
        actual: "a path containing \\0",
      });
    }
    return true;
  })
  .pipe((path: string) => path.replace(/[\\/]+/g, "/"));

export type FilePath = typeof FilePathSchema.infer;

export interface FileReaderOptions {
  /** Maximum file size in bytes (after decompression) */
  maxFileSize?: number;
  /** Gunzip compressed input transparently */
  autoDecompress?: boolean;
}

export const FileReaderOptionsSchema = type({
  "maxFileSize?": "number>=0",
  "autoDecompress?": "boolean",
});
