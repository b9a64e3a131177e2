/**
 * Output handlers for the report (justified text table, JSON).
 */

import { writeFileSync } from "node:fs";
import type { ComparisonResult } from "../core/compare.js";
import type { DetectionReport } from "../core/detect.js";
import { RENDER_CONFIG } from "../config.js";
import { logSuccess } from "./colors.js";

export interface OutputOptions {
  outFile: string | null;
  quiet: boolean;
  json: boolean;
}

const HEADER = ["Documents", "Overlap", "Similarity"] as const;

// ─── Text Table ─────────────────────────────────────────────────────────────

export function formatSimilarity(similarity: number): string {
  return similarity.toFixed(RENDER_CONFIG.SIMILARITY_DIGITS);
}

function toRow(result: ComparisonResult): string[] {
  return [`${result.ids[0]} <-> ${result.ids[1]}`, String(result.overlap), formatSimilarity(result.similarity)];
}

/**
 * Render results as left-justified columns with a header row.
 * The last column is not padded.
 */
export function formatResultsTable(results: readonly ComparisonResult[]): string {
  const rows: string[][] = [[...HEADER], ...results.map(toRow)];
  const widths = HEADER.map((_, col) => Math.max(...rows.map((row) => row[col].length)));
  const gap = " ".repeat(RENDER_CONFIG.COLUMN_GAP);

  return rows
    .map((row) =>
      row.map((cell, col) => (col === row.length - 1 ? cell : cell.padEnd(widths[col]))).join(gap),
    )
    .join("\n");
}

/**
 * One line per source that was skipped or excluded as too short.
 */
export function formatExclusions(report: DetectionReport): string[] {
  const lines: string[] = [];
  for (const { id, error } of report.skipped) {
    lines.push(`skipped ${id}: ${error.message}`);
  }
  for (const error of report.degenerate) {
    lines.push(`too short to compare: ${error.id} (${error.tokenCount} words, n=${report.params.n})`);
  }
  return lines;
}

// ─── JSON Output ────────────────────────────────────────────────────────────

export function generateJson(report: DetectionReport, version: string): string {
  return JSON.stringify(
    {
      version,
      params: report.params,
      stats: report.stats,
      results: report.results,
      skipped: report.skipped.map(({ id, error }) => ({ id, reason: error.message })),
      degenerate: report.degenerate.map((error) => ({ id: error.id, tokenCount: error.tokenCount })),
    },
    null,
    2,
  );
}

// ─── Output Handlers ────────────────────────────────────────────────────────

/**
 * Write the report body to stdout or a file.
 * @returns the rendered body
 */
export function outputReport(report: DetectionReport, opts: OutputOptions, version: string): string {
  const body = opts.json ? generateJson(report, version) : formatResultsTable(report.results);

  if (opts.outFile && opts.outFile !== "-") {
    writeFileSync(opts.outFile, body + "\n", "utf-8");
    if (!opts.quiet) logSuccess(`${opts.json ? "JSON" : "Report"} written to: ${opts.outFile}`);
  } else {
    process.stdout.write(body + "\n");
  }

  return body;
}
