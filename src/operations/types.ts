/**
 * Option types for the mapping processors
 *
 * @since v0.1.0
 */

import type { LayoutConfig } from "../types";

/**
 * Options for mapping a peptide list onto proteins
 */
export interface MapOptions {
  /** Maximum substitutions per occurrence (default 0: exact matching) */
  budget?: number;

  /** Row layout overrides, merged over `{ maxRows: 2, minGap: 10 }` */
  layout?: Partial<LayoutConfig>;

  /** Also yield proteins where no peptide was found */
  includeUnmatched?: boolean;

  /** Print progress for each protein to the console */
  verbose?: boolean;
}
