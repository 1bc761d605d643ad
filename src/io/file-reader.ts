/**
 * File reading utilities for peptide-map inputs
 *
 * Filesystem calls run as Effects so that every failure is typed as a
 * FileError carrying the operation and path, then surface to callers as
 * ordinary promise rejections.
 */

import type { Stats } from "node:fs";
import { readFile, stat } from "node:fs/promises";
import { type } from "arktype";
import { Effect, Either } from "effect";
import { FileError, ValidationError } from "../errors";
import type { FilePath, FileReaderOptions } from "../types";
import { FilePathSchema, FileReaderOptionsSchema } from "../types";
import { decompressGzip, isGzipped } from "./compression";

// Module-level constants for default options
const DEFAULT_OPTIONS: Required<FileReaderOptions> = {
  maxFileSize: 104_857_600, // 100MB
  autoDecompress: true,
};

/**
 * Run an Effect and rethrow its typed failure as-is
 */
async function runFileEffect<A>(program: Effect.Effect<A, FileError>): Promise<A> {
  const result = await Effect.runPromise(Effect.either(program));
  if (Either.isLeft(result)) {
    throw result.left;
  }
  return result.right;
}

function statFile(path: FilePath): Effect.Effect<Stats, FileError> {
  return Effect.tryPromise({
    try: () => stat(path),
    catch: (error) => FileError.fromSystemError("stat", path, error),
  });
}

/**
 * Check if a path exists and is a regular file
 *
 * Only a missing path (or a missing parent directory) reads as absent.
 *
 * @throws {FileError} If path validation fails or the path cannot be inspected
 */
export async function exists(path: string): Promise<boolean> {
  const validatedPath = validatePath(path);

  const program = statFile(validatedPath).pipe(
    Effect.map((info) => info.isFile()),
    Effect.catchIf(isMissingPathError, () => Effect.succeed(false))
  );

  return runFileEffect(program);
}

/**
 * Get file size in bytes
 *
 * @throws {FileError} If file cannot be accessed or doesn't exist
 */
export async function getSize(path: string): Promise<number> {
  const validatedPath = validatePath(path);
  return runFileEffect(statFile(validatedPath).pipe(Effect.map((info) => info.size)));
}

/**
 * Read an entire file to a UTF-8 string
 *
 * Gzip-compressed content is decompressed transparently unless
 * `autoDecompress` is false. The size limit applies to the file on disk
 * and again to the decompressed bytes.
 *
 * @throws {FileError} If the file cannot be read, is too large or fails to decompress
 * @throws {ValidationError} If the options are malformed
 */
export async function readToString(path: string, options: FileReaderOptions = {}): Promise<string> {
  const validatedPath = validatePath(path);
  const mergedOptions = mergeOptions(options);

  const program = Effect.gen(function* () {
    const info = yield* statFile(validatedPath);
    if (!info.isFile()) {
      return yield* Effect.fail(
        new FileError("Path is not a regular file", validatedPath, "stat")
      );
    }
    yield* checkSize(validatedPath, info.size, mergedOptions.maxFileSize);

    const raw = yield* Effect.tryPromise({
      try: () => readFile(validatedPath),
      catch: (error) => FileError.fromSystemError("read", validatedPath, error),
    });
    let bytes: Uint8Array = new Uint8Array(raw.buffer, raw.byteOffset, raw.byteLength);

    if (mergedOptions.autoDecompress && isGzipped(validatedPath, bytes)) {
      const compressed = bytes;
      bytes = yield* Effect.tryPromise({
        try: () => decompressGzip(compressed),
        catch: (error) => FileError.fromSystemError("decompress", validatedPath, error),
      });
      yield* checkSize(validatedPath, bytes.byteLength, mergedOptions.maxFileSize);
    }

    return new TextDecoder("utf-8").decode(bytes);
  });

  return runFileEffect(program);
}

export const FileReader = {
  exists,
  getSize,
  readToString,
} as const;

// =============================================================================
// PRIVATE HELPER FUNCTIONS
// =============================================================================

function checkSize(
  path: FilePath,
  size: number,
  maxFileSize: number
): Effect.Effect<void, FileError> {
  return size > maxFileSize
    ? Effect.fail(
        new FileError(
          `File too large: ${size} bytes exceeds limit of ${maxFileSize} bytes`,
          path,
          "read"
        )
      )
    : Effect.void;
}

function isMissingPathError(error: FileError): boolean {
  const cause = error.systemError;
  return (
    cause instanceof Error &&
    "code" in cause &&
    (cause.code === "ENOENT" || cause.code === "ENOTDIR")
  );
}

/**
 * Validate file path using ArkType
 */
function validatePath(path: string): FilePath {
  const validationResult = FilePathSchema(path);
  if (validationResult instanceof type.errors) {
    throw new FileError(`Invalid file path: ${validationResult.summary}`, path, "stat");
  }
  return validationResult;
}

/**
 * Merge user options with defaults
 */
function mergeOptions(options: FileReaderOptions): Required<FileReaderOptions> {
  const validationResult = FileReaderOptionsSchema(options);
  if (validationResult instanceof type.errors) {
    throw new ValidationError(`Invalid file reader options: ${validationResult.summary}`);
  }

  return {
    maxFileSize: options.maxFileSize ?? DEFAULT_OPTIONS.maxFileSize,
    autoDecompress: options.autoDecompress ?? DEFAULT_OPTIONS.autoDecompress,
  };
}
