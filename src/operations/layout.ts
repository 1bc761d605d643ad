/**
 * Row packing for peptide display
 *
 * Greedy first-fit over a fixed number of rows. An occurrence goes to the
 * first row whose last occurrence ends more than `minGap` residues before
 * it starts. When every row is busy, it goes to the row that frees up
 * soonest and overlaps there: the layout never grows past `maxRows` and
 * never drops an occurrence.
 */

import type { LayoutConfig, Occurrence, RowAssignment } from "../types";
import { resolveLayoutConfig } from "./core/validation";

/**
 * Assign each occurrence to a display row
 *
 * Occurrences are packed in the order given, which should be the order
 * produced by `aggregateOccurrences` (start, then span length).
 *
 * @param occurrences - Occurrences for one protein
 * @param config - Layout overrides, merged over `{ maxRows: 2, minGap: 10 }`
 * @throws {ConfigurationError} When maxRows or minGap is invalid
 *
 * @example
 * ```typescript
 * const { rows } = packRows(aggregateOccurrences(peptides, protein, 0), { maxRows: 3 });
 * rows.forEach((row, index) => console.log(index, row.map((o) => o.peptide)));
 * ```
 */
export function packRows(
  occurrences: readonly Occurrence[],
  config: Partial<LayoutConfig> = {}
): RowAssignment {
  const { maxRows, minGap } = resolveLayoutConfig(config);

  const rows: Occurrence[][] = Array.from({ length: maxRows }, () => []);
  // 0-based end of the last occurrence placed in each row
  const rowEnds: number[] = new Array<number>(maxRows).fill(0);
  let overflowCount = 0;

  for (const occurrence of occurrences) {
    const start = occurrence.start - 1;
    const end = occurrence.end - 1;

    const row = firstFreeRow(rowEnds, start, minGap);
    if (row !== undefined) {
      rows[row].push(occurrence);
      rowEnds[row] = end;
      continue;
    }

    const fallback = earliestEndingRow(rowEnds);
    rows[fallback].push(occurrence);
    rowEnds[fallback] = Math.max(rowEnds[fallback], end);
    overflowCount++;
  }

  return { rows, overflowCount };
}

function firstFreeRow(rowEnds: readonly number[], start: number, minGap: number): number | undefined {
  const index = rowEnds.findIndex((rowEnd) => start > rowEnd + minGap);
  return index === -1 ? undefined : index;
}

/**
 * Row with the smallest end position; lowest index wins ties
 */
function earliestEndingRow(rowEnds: readonly number[]): number {
  let best = 0;
  for (let i = 1; i < rowEnds.length; i++) {
    if (rowEnds[i] < rowEnds[best]) {
      best = i;
    }
  }
  return best;
}
