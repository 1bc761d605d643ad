/**
 * Gzip detection and decompression for input files
 *
 * Peptide lists and protein dumps are often shipped gzipped; detection
 * trusts the magic bytes first and the file extension second.
 */

import { gunzip } from "node:zlib";
import { promisify } from "node:util";

const GZIP_MAGIC_FIRST_BYTE = 0x1f;
const GZIP_MAGIC_SECOND_BYTE = 0x8b;

const GZIP_EXTENSIONS = [".gz", ".gzip"] as const;

const gunzipAsync = promisify(gunzip);

/**
 * True when the buffer starts with the gzip magic bytes
 */
export function hasGzipMagic(bytes: Uint8Array): boolean {
  return (
    bytes.length >= 2 && bytes[0] === GZIP_MAGIC_FIRST_BYTE && bytes[1] === GZIP_MAGIC_SECOND_BYTE
  );
}

/**
 * True when the path carries a gzip extension (case-insensitive)
 */
export function hasGzipExtension(filePath: string): boolean {
  const normalized = filePath.toLowerCase();
  return GZIP_EXTENSIONS.some((extension) => normalized.endsWith(extension));
}

/**
 * Decide whether file contents should be gunzipped
 *
 * A `.gz` file without the magic bytes is read as plain text.
 */
export function isGzipped(filePath: string, bytes: Uint8Array): boolean {
  if (hasGzipMagic(bytes)) return true;
  if (hasGzipExtension(filePath) && bytes.length > 0) {
    console.warn(`${filePath} has a gzip extension but no gzip header; reading as plain text`);
  }
  return false;
}

export async function decompressGzip(compressed: Uint8Array): Promise<Uint8Array> {
  const result = await gunzipAsync(compressed);
  return new Uint8Array(result.buffer, result.byteOffset, result.byteLength);
}
