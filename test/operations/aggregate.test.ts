/**
 * Tests for occurrence aggregation and packing order
 */

import { describe, expect, test } from "vitest";
import { ConfigurationError } from "../../src/errors";
import { aggregateOccurrences, compareOccurrences } from "../../src/operations/aggregate";
import type { Occurrence } from "../../src/types";

function occurrence(peptide: string, start: number, end: number): Occurrence {
  return { peptide, start, end, mismatches: 0, matchedText: peptide };
}

describe("aggregateOccurrences", () => {
  test("orders occurrences from all peptides by start", () => {
    const result = aggregateOccurrences(["KVL", "MK"], "MKVLATG", 0);

    expect(result.map((o) => [o.peptide, o.start, o.end])).toEqual([
      ["MK", 1, 2],
      ["KVL", 2, 4],
    ]);
  });

  test("puts shorter spans first at the same start", () => {
    const result = aggregateOccurrences(["MKVL", "MK"], "MKVLATG", 0);

    expect(result.map((o) => o.peptide)).toEqual(["MK", "MKVL"]);
  });

  test("keeps different peptides matching the same span", () => {
    const result = aggregateOccurrences(["KVL", "KVI"], "MKVLATG", 1);

    expect(result).toEqual([
      { peptide: "KVL", start: 2, end: 4, mismatches: 0, matchedText: "KVL" },
      { peptide: "KVI", start: 2, end: 4, mismatches: 1, matchedText: "KVL" },
    ]);
  });

  test("keeps duplicate peptides as separate occurrences", () => {
    const result = aggregateOccurrences(["KVL", "KVL"], "MKVLATG", 0);

    expect(result).toHaveLength(2);
  });

  test("returns nothing for an empty peptide list", () => {
    expect(aggregateOccurrences([], "MKVLATG", 0)).toEqual([]);
  });

  test("skips peptides longer than the protein", () => {
    const result = aggregateOccurrences(["ACDEFGHIKLMN", "AT"], "MKVLATG", 0);

    expect(result.map((o) => o.peptide)).toEqual(["AT"]);
  });

  test("rejects an invalid budget before matching", () => {
    expect(() => aggregateOccurrences([], "MKVLATG", -1)).toThrow(ConfigurationError);
  });
});

describe("compareOccurrences", () => {
  test("sorts by start, then by span length", () => {
    const unsorted = [
      occurrence("LONG", 5, 12),
      occurrence("LATE", 9, 10),
      occurrence("SHORT", 5, 6),
      occurrence("FIRST", 1, 20),
    ];

    expect([...unsorted].sort(compareOccurrences).map((o) => o.peptide)).toEqual([
      "FIRST",
      "SHORT",
      "LONG",
      "LATE",
    ]);
  });

  test("treats equal start and span as equal", () => {
    expect(compareOccurrences(occurrence("A", 3, 5), occurrence("B", 3, 5))).toBe(0);
  });
});
