/**
 * Tests for file reading with transparent gzip support
 */

import { mkdirSync, mkdtempSync, rmSync, symlinkSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { gzipSync, strToU8 } from "fflate";
import { afterAll, afterEach, beforeAll, describe, expect, test, vi } from "vitest";
import { FileError, ValidationError } from "../../src/errors";
import { exists, FileReader, getSize, readToString } from "../../src/io/file-reader";

const PEPTIDE_TEXT = "KVL\nATG\n";

let fixturesDir: string;
let files: {
  plain: string;
  gzipped: string;
  gzippedNoExtension: string;
  fakeGzip: string;
  corruptGzip: string;
  empty: string;
  directory: string;
  missing: string;
  underFile: string;
  loop: string;
};

beforeAll(() => {
  fixturesDir = mkdtempSync(join(tmpdir(), "peptide-map-reader-"));
  files = {
    plain: join(fixturesDir, "peptides.txt"),
    gzipped: join(fixturesDir, "peptides.txt.gz"),
    gzippedNoExtension: join(fixturesDir, "peptides.bin"),
    fakeGzip: join(fixturesDir, "plain.txt.gz"),
    corruptGzip: join(fixturesDir, "corrupt.txt.gz"),
    empty: join(fixturesDir, "empty.txt"),
    directory: join(fixturesDir, "nested"),
    missing: join(fixturesDir, "missing.txt"),
    underFile: join(fixturesDir, "peptides.txt", "child.txt"),
    loop: join(fixturesDir, "loop-a"),
  };

  writeFileSync(files.plain, PEPTIDE_TEXT);
  writeFileSync(files.gzipped, gzipSync(strToU8(PEPTIDE_TEXT)));
  writeFileSync(files.gzippedNoExtension, gzipSync(strToU8(PEPTIDE_TEXT)));
  writeFileSync(files.fakeGzip, PEPTIDE_TEXT);
  writeFileSync(files.corruptGzip, new Uint8Array([0x1f, 0x8b, 0x00, 0x01, 0x02]));
  writeFileSync(files.empty, "");
  mkdirSync(files.directory);
  symlinkSync(join(fixturesDir, "loop-b"), files.loop);
  symlinkSync(files.loop, join(fixturesDir, "loop-b"));
});

afterAll(() => {
  rmSync(fixturesDir, { recursive: true, force: true });
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe("FileReader", () => {
  describe("exists", () => {
    test("detects regular files", async () => {
      expect(await exists(files.plain)).toBe(true);
      expect(await exists(files.empty)).toBe(true);
    });

    test("reports missing files and directories as absent", async () => {
      expect(await exists(files.missing)).toBe(false);
      expect(await exists(files.directory)).toBe(false);
    });

    test("reports a path below a regular file as absent", async () => {
      expect(await exists(files.underFile)).toBe(false);
    });

    test("fails for paths that exist but cannot be resolved", async () => {
      const error = await exists(files.loop).catch((reason: unknown) => reason);

      expect(error).toBeInstanceOf(FileError);
      expect(error).toHaveProperty("operation", "stat");
      expect(error).toHaveProperty("filePath", files.loop);
    });

    test("rejects an empty path", async () => {
      await expect(exists("")).rejects.toBeInstanceOf(FileError);
    });

    test("rejects a path containing a null character", async () => {
      await expect(exists("peptides\0.txt")).rejects.toBeInstanceOf(FileError);
    });
  });

  describe("getSize", () => {
    test("returns the size on disk", async () => {
      expect(await getSize(files.plain)).toBe(8);
      expect(await getSize(files.empty)).toBe(0);
    });

    test("fails with a stat error for missing files", async () => {
      const error = await getSize(files.missing).catch((reason: unknown) => reason);

      expect(error).toBeInstanceOf(FileError);
      expect(error).toHaveProperty("operation", "stat");
      expect(error).toHaveProperty("filePath", files.missing);
    });
  });

  describe("readToString", () => {
    test("reads plain text", async () => {
      expect(await readToString(files.plain)).toBe(PEPTIDE_TEXT);
    });

    test("reads an empty file", async () => {
      expect(await readToString(files.empty)).toBe("");
    });

    test("gunzips compressed files", async () => {
      expect(await readToString(files.gzipped)).toBe(PEPTIDE_TEXT);
    });

    test("detects gzip by content, not extension", async () => {
      expect(await readToString(files.gzippedNoExtension)).toBe(PEPTIDE_TEXT);
    });

    test("leaves compressed bytes alone when autoDecompress is off", async () => {
      const text = await readToString(files.gzipped, { autoDecompress: false });

      expect(text).not.toBe(PEPTIDE_TEXT);
      expect(text.charCodeAt(0)).toBe(0x1f);
    });

    test("reads a .gz file without a gzip header as plain text", async () => {
      const warn = vi.spyOn(console, "warn").mockImplementation(() => {});

      expect(await readToString(files.fakeGzip)).toBe(PEPTIDE_TEXT);
      expect(warn).toHaveBeenCalledWith(
        `${files.fakeGzip} has a gzip extension but no gzip header; reading as plain text`
      );
    });

    test("fails with a decompress error for corrupt gzip data", async () => {
      const error = await readToString(files.corruptGzip).catch((reason: unknown) => reason);

      expect(error).toBeInstanceOf(FileError);
      expect(error).toHaveProperty("operation", "decompress");
    });

    test("enforces the size limit", async () => {
      const error = await readToString(files.plain, { maxFileSize: 4 }).catch(
        (reason: unknown) => reason
      );

      expect(error).toBeInstanceOf(FileError);
      expect(error).toHaveProperty(
        "message",
        "File too large: 8 bytes exceeds limit of 4 bytes"
      );
    });

    test("rejects directories", async () => {
      const error = await readToString(files.directory).catch((reason: unknown) => reason);

      expect(error).toBeInstanceOf(FileError);
      expect(error).toHaveProperty("message", "Path is not a regular file");
    });

    test("rejects missing files", async () => {
      await expect(readToString(files.missing)).rejects.toBeInstanceOf(FileError);
    });

    test("rejects malformed options", async () => {
      await expect(readToString(files.plain, { maxFileSize: -1 })).rejects.toBeInstanceOf(
        ValidationError
      );
    });
  });

  test("exposes the reader functions on a namespace object", () => {
    expect(FileReader.readToString).toBe(readToString);
    expect(FileReader.exists).toBe(exists);
    expect(FileReader.getSize).toBe(getSize);
  });
});
