import { describe, it, expect } from "vitest";
import { compareDocuments, compareIds, intersectionSize } from "../src/core/compare.js";
import { buildDocument } from "../src/core/document.js";
import { DegenerateDocumentError } from "../src/errors.js";

const docA = buildDocument("A", "a b c d", 2);
const docB = buildDocument("B", "b c d e", 2);

describe("compareDocuments", () => {
  it("should count shared shingles and normalize by the smaller set", () => {
    const result = compareDocuments(docA, docB);
    expect(result.ids).toEqual(["A", "B"]);
    expect(result.overlap).toBe(2);
    expect(result.denominator).toBe(3);
    expect(result.similarity).toBe(2 / 3);
  });

  it("should be symmetric", () => {
    expect(compareDocuments(docB, docA)).toEqual(compareDocuments(docA, docB));
  });

  it("should give full similarity for a document against itself", () => {
    const result = compareDocuments(docA, docA);
    expect(result.overlap).toBe(docA.shingles.size);
    expect(result.similarity).toBe(1);
  });

  it("should reach 1 when the smaller document is contained in the larger", () => {
    const small = buildDocument("small", "b c d", 2);
    const result = compareDocuments(small, docA);
    expect(result.ids).toEqual(["A", "small"]);
    expect(result.overlap).toBe(2);
    expect(result.similarity).toBe(1);
  });

  it("should report zero similarity for unrelated documents", () => {
    const other = buildDocument("C", "x y z", 2);
    expect(compareDocuments(docA, other).similarity).toBe(0);
  });

  it("should refuse documents without shingles", () => {
    const short = buildDocument("short", "one two", 3);
    const compareShort = () => compareDocuments(docA, short);

    expect(compareShort).toThrow(DegenerateDocumentError);
    expect(compareShort).toThrow('Document "short" is too short to compare (2 words)');
  });
});

describe("compareIds", () => {
  it("should order by code unit, not locale", () => {
    expect(compareIds("B", "a")).toBe(-1);
    expect(compareIds("a", "B")).toBe(1);
    expect(compareIds("x", "x")).toBe(0);
  });
});

describe("intersectionSize", () => {
  it("should count common elements regardless of argument order", () => {
    const a = new Set(["1", "2", "3", "4"]);
    const b = new Set(["3", "4", "5"]);
    expect(intersectionSize(a, b)).toBe(2);
    expect(intersectionSize(b, a)).toBe(2);
    expect(intersectionSize(a, new Set())).toBe(0);
  });
});
