import { describe, it, expect, vi } from "vitest";
import { detectSimilarity } from "../src/core/detect.js";
import type { SourceInput } from "../src/core/document.js";
import { InvalidParameterError, SourceUnavailableError } from "../src/errors.js";

const sources: SourceInput[] = [
  { id: "s1", source: "One two three four five." },
  { id: "s2", source: "one, two, three, four, six" },
  { id: "s3", source: "seven eight nine ten" },
  { id: "s4", source: "tiny" },
  {
    id: "s5",
    source: () => {
      throw new Error("vanished");
    },
  },
];

describe("detectSimilarity", () => {
  it("should rank comparable documents and report the rest", () => {
    const report = detectSimilarity(sources, { n: 2, threshold: 0.5 });

    expect(report.results).toEqual([{ ids: ["s1", "s2"], overlap: 3, denominator: 4, similarity: 0.75 }]);

    expect(report.skipped.map((s) => s.id)).toEqual(["s5"]);
    expect(report.skipped[0].error).toBeInstanceOf(SourceUnavailableError);
    expect(report.skipped[0].error.message).toBe('Cannot read source "s5": vanished');

    expect(report.degenerate.map((d) => [d.id, d.tokenCount])).toEqual([["s4", 1]]);

    expect(report.stats).toEqual({
      sources: 5,
      documents: 4,
      compared: 3,
      pairsCompared: 3,
      pairsMatched: 1,
    });
  });

  it("should echo the validated parameters", () => {
    const report = detectSimilarity([], { n: 3 });
    expect(report.params).toEqual({ n: 3, threshold: 0.5, maxResults: undefined, format: "plain" });
    expect(report.results).toEqual([]);
  });

  it("should fail before reading any source when parameters are invalid", () => {
    const read = vi.fn(() => "a b c");
    expect(() => detectSimilarity([{ id: "x", source: read }], { n: 0 })).toThrow(InvalidParameterError);
    expect(read).not.toHaveBeenCalled();
  });

  it("should reject duplicate identifiers before reading any source", () => {
    const read = vi.fn(() => "a b c");
    // The second "x" is too short to compare, but the ids still clash
    const dup: SourceInput[] = [
      { id: "x", source: read },
      { id: "x", source: "tiny" },
    ];
    expect(() => detectSimilarity(dup, { n: 2 })).toThrow('Invalid documents: duplicate identifier "x"');
    expect(read).not.toHaveBeenCalled();

    const unreadable: SourceInput[] = [
      { id: "y", source: "one two three" },
      {
        id: "y",
        source: () => {
          throw new Error("vanished");
        },
      },
    ];
    expect(() => detectSimilarity(unreadable, { n: 2 })).toThrow(InvalidParameterError);
  });

  it("should count matches before applying the cap", () => {
    const same: SourceInput[] = ["a", "b", "c"].map((id) => ({ id, source: "the same four words" }));
    const report = detectSimilarity(same, { n: 2, threshold: 0.5, maxResults: 1 });

    expect(report.results.map((r) => r.ids)).toEqual([["a", "b"]]);
    expect(report.stats.pairsMatched).toBe(3);
  });

  it("should give identical results on repeated runs", () => {
    const first = detectSimilarity(sources, { n: 1, threshold: 0 });
    const second = detectSimilarity(sources, { n: 1, threshold: 0 });
    expect(JSON.stringify(second.results)).toBe(JSON.stringify(first.results));
  });

  it("should compare markdown sources by their prose", () => {
    const docs: SourceInput[] = [
      { id: "a.md", source: "# Notes\n\nShared **sentence** here." },
      { id: "b.md", source: "Shared sentence [here](http://example.com)." },
    ];
    const report = detectSimilarity(docs, { n: 3, threshold: 0.9, format: "markdown" });
    expect(report.results).toEqual([{ ids: ["a.md", "b.md"], overlap: 1, denominator: 1, similarity: 1 }]);
  });
});
