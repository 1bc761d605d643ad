/**
 * peptide-map - locate peptides in proteins and lay them out in rows
 *
 * Finds every occurrence of each peptide in each protein within a
 * substitution budget, then packs the occurrences into a fixed number of
 * display rows for a renderer to draw.
 */

// Error types
export {
  ConfigurationError,
  ERROR_SUGGESTIONS,
  FileError,
  getErrorSuggestion,
  PeptideMapError,
  ValidationError,
} from "./errors";
// File I/O
export { exists, FileReader, getSize, readToString } from "./io/file-reader";
export { parsePeptideList, readPeptides } from "./io/peptide-reader";
// Mapping operations
export {
  aggregateOccurrences,
  compareOccurrences,
  countMismatches,
  DEFAULT_LAYOUT_CONFIG,
  DEFAULT_MISMATCH_BUDGET,
  findOccurrences,
  formatOccurrenceLabel,
  iterateProteins,
  longestPeptideLength,
  type MapOptions,
  mapPeptides,
  mismatchLegend,
  packRows,
  PeptideMapper,
  PeptideMapProcessor,
  peptideMap,
  resolveLayoutConfig,
  summarizeOccurrences,
  validateBudget,
} from "./operations";
// Core types
export type {
  AbstractSequence,
  FilePath,
  FileReaderOptions,
  LayoutConfig,
  MatchSummary,
  Occurrence,
  ProteinPeptideMap,
  ProteinSource,
  RowAssignment,
} from "./types";
export {
  FilePathSchema,
  FileReaderOptionsSchema,
  MaxRowsSchema,
  MinGapSchema,
  MismatchBudgetSchema,
} from "./types";
