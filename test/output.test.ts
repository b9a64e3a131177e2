import { describe, it, expect } from "vitest";
import { formatResultsTable, formatSimilarity, formatExclusions, generateJson } from "../src/cli/output.js";
import { formatStats } from "../src/cli/stats.js";
import type { ComparisonResult } from "../src/core/compare.js";
import type { DetectionReport } from "../src/core/detect.js";
import { DegenerateDocumentError, NotFileOrDirectoryError } from "../src/errors.js";

const stripAnsi = (s: string) => s.replace(/\x1b\[[0-9;]*m/g, "");

const results: ComparisonResult[] = [
  { ids: ["a.txt", "b.txt"], overlap: 12, denominator: 16, similarity: 0.75 },
  { ids: ["a.txt", "long-name.txt"], overlap: 3, denominator: 6, similarity: 0.5 },
];

const report: DetectionReport = {
  params: { n: 4, threshold: 0.4, format: "plain" },
  results,
  skipped: [{ id: "dangling", error: new NotFileOrDirectoryError("dangling") }],
  degenerate: [new DegenerateDocumentError("note.txt", 2)],
  stats: { sources: 5, documents: 4, compared: 3, pairsCompared: 3, pairsMatched: 2 },
};

describe("formatSimilarity", () => {
  it("should round to four decimals", () => {
    expect(formatSimilarity(2 / 3)).toBe("0.6667");
    expect(formatSimilarity(1)).toBe("1.0000");
  });
});

describe("formatResultsTable", () => {
  it("should justify columns to the widest cell", () => {
    expect(formatResultsTable(results).split("\n")).toEqual([
      "Documents" + " ".repeat(16) + "Overlap  Similarity",
      "a.txt <-> b.txt" + " ".repeat(10) + "12" + " ".repeat(7) + "0.7500",
      "a.txt <-> long-name.txt" + " ".repeat(2) + "3" + " ".repeat(8) + "0.5000",
    ]);
  });

  it("should print only the header when nothing matched", () => {
    expect(formatResultsTable([])).toBe("Documents  Overlap  Similarity");
  });
});

describe("formatExclusions", () => {
  it("should list skipped and too-short sources", () => {
    expect(formatExclusions(report)).toEqual([
      'skipped dangling: Cannot read source "dangling": neither file nor directory',
      "too short to compare: note.txt (2 words, n=4)",
    ]);
  });
});

describe("generateJson", () => {
  it("should serialize the full report", () => {
    const parsed: unknown = JSON.parse(generateJson(report, "1.2.3"));
    expect(parsed).toEqual({
      version: "1.2.3",
      params: { n: 4, threshold: 0.4, format: "plain" },
      stats: { sources: 5, documents: 4, compared: 3, pairsCompared: 3, pairsMatched: 2 },
      results: [
        { ids: ["a.txt", "b.txt"], overlap: 12, denominator: 16, similarity: 0.75 },
        { ids: ["a.txt", "long-name.txt"], overlap: 3, denominator: 6, similarity: 0.5 },
      ],
      skipped: [{ id: "dangling", reason: 'Cannot read source "dangling": neither file nor directory' }],
      degenerate: [{ id: "note.txt", tokenCount: 2 }],
    });
  });
});

describe("formatStats", () => {
  it("should summarize a run", () => {
    expect(stripAnsi(formatStats(report.stats, 2))).toBe(
      "3 documents compared, 3 pairs, 2 above threshold, 2 excluded",
    );
  });

  it("should mention when the cap hid matches", () => {
    expect(stripAnsi(formatStats(report.stats, 1))).toBe(
      "3 documents compared, 3 pairs, 2 above threshold (showing 1), 2 excluded",
    );
  });

  it("should say when nothing matched", () => {
    const stats = { sources: 2, documents: 2, compared: 2, pairsCompared: 1, pairsMatched: 0 };
    expect(stripAnsi(formatStats(stats, 0))).toBe("2 documents compared, 1 pair, no matches");
  });
});
