/**
 * Peptide list input
 *
 * A peptide list is plain text with one peptide per line. Surrounding
 * whitespace is trimmed and blank lines are skipped; order and duplicates
 * are kept because the list order is the label order.
 */

import type { FileReaderOptions } from "../types";
import { readToString } from "./file-reader";

/**
 * Split peptide list text into peptides
 *
 * @example
 * ```typescript
 * parsePeptideList("KVL\n\n  ATG \r\n"); // ["KVL", "ATG"]
 * ```
 */
export function parsePeptideList(text: string): string[] {
  const peptides: string[] = [];
  for (const line of text.split(/\r?\n/)) {
    const peptide = line.trim();
    if (peptide !== "") {
      peptides.push(peptide);
    }
  }
  return peptides;
}

/**
 * Read a peptide list file (plain or gzipped)
 *
 * @throws {FileError} If the file cannot be read
 */
export async function readPeptides(path: string, options: FileReaderOptions = {}): Promise<string[]> {
  return parsePeptideList(await readToString(path, options));
}
