#!/usr/bin/env node

/**
 * CLI entry point using commander.js.
 * Discovers files, runs detection, prints the ranked pairs.
 */

import { program } from "commander";
import { readFileSync } from "node:fs";
import { DETECTION_DEFAULTS, SOURCE_FORMATS, type SourceFormat } from "../config.js";
import { detectSimilarity, type DetectionReport } from "../core/detect.js";
import { validateParams } from "../core/params.js";
import { InvalidParameterError, SourceUnavailableError } from "../errors.js";
import { setDebugEnabled, setVerboseEnabled, verbose } from "../debug.js";
import { c, logError, logInfo, logWarn } from "./colors.js";
import { discoverSources, withDiscoverySkips } from "./sources.js";
import { formatExclusions, outputReport, type OutputOptions } from "./output.js";
import { formatStats } from "./stats.js";
import { getCompletion, isValidShell } from "./completions.js";

type CliOptions = {
  dir?: string;
  recursive?: boolean;
  nValue: number;
  threshold: number;
  maxResults?: number;
  format: SourceFormat;
  ext?: string[];
  json?: boolean;
  out?: string;
  quiet?: boolean;
  verbose?: boolean;
  debug?: boolean;
  completions?: string;
};

/** CLI flag for each run parameter, for error hints */
const PARAM_FLAGS: Record<string, string> = {
  n: "--n-value",
  threshold: "--threshold",
  maxResults: "--max-results",
  format: "--format",
};

// ─── Version ─────────────────────────────────────────────────────────────────

function getVersion(): string {
  try {
    const pkgPath = new URL("../../package.json", import.meta.url);
    const pkg: unknown = JSON.parse(readFileSync(pkgPath, "utf-8"));
    if (typeof pkg === "object" && pkg !== null && "version" in pkg && typeof pkg.version === "string") {
      return pkg.version;
    }
    return "unknown";
  } catch {
    return "unknown";
  }
}

const VERSION = getVersion();

// ─── Option Parsing ──────────────────────────────────────────────────────────

/** Blank strings become NaN so validation rejects them instead of reading 0 */
function parseNumber(value: string): number {
  return value.trim() === "" ? Number.NaN : Number(value);
}

function collectExtensions(value: string, previous: string[] = []): string[] {
  const exts = value.split(",").map((ext) => ext.trim()).filter(Boolean);
  return [...previous, ...exts];
}

// ─── Command Setup ───────────────────────────────────────────────────────────

program
  .name("shingle-check")
  .description("Find pairs of documents that share word sequences")
  .version(VERSION, "-V, --version")
  .argument("[directory]", "Directory of documents to compare (default: current directory)")
  .option("-d, --dir <directory>", "Directory to search through")
  .option("-r, --recursive", "Search subdirectories")
  .option("-n, --n-value <n>", "Words per shingle", parseNumber, DETECTION_DEFAULTS.N_VALUE)
  .option("-t, --threshold <similarity>", "Report pairs with similarity above this (0-1)", parseNumber, DETECTION_DEFAULTS.THRESHOLD)
  .option("-m, --max-results <count>", "Show at most this many pairs", parseNumber)
  .option("--format <format>", `Source format: ${SOURCE_FORMATS.join(", ")}`, DETECTION_DEFAULTS.FORMAT)
  .option("--ext <extensions>", "Only include files with these extensions (comma-separated)", collectExtensions)
  .option("-j, --json", "Output as JSON")
  .option("-o, --out <file>", "Write report to file (use - for stdout)")
  .option("-q, --quiet", "Suppress non-essential output")
  .option("-v, --verbose", "Show progress and timing")
  .option("--debug", "Enable granular debug output")
  .option("--completions <shell>", "Output shell completion script (bash, zsh, fish)");

program.addHelpText(
  "after",
  `
${c.bold}How it works${c.reset}
  Every document is split into overlapping runs of n words ("shingles").
  Two documents are as similar as the share of the smaller one's shingles
  that also appear in the other. Larger n demands longer verbatim overlap.

${c.bold}Examples${c.reset}
  ${c.dim}# Compare every file in a directory${c.reset}
  shingle-check submissions/

  ${c.dim}# Whole sentences only, top 10 pairs${c.reset}
  shingle-check -n 12 -t 0.2 -m 10 submissions/

  ${c.dim}# Markdown essays, searching subdirectories${c.reset}
  shingle-check -r --format markdown --ext md essays/
`,
);

// ─── Main ────────────────────────────────────────────────────────────────────

function printExclusions(report: DetectionReport): void {
  for (const line of formatExclusions(report)) {
    logWarn(line);
  }
}

async function main() {
  await program.parseAsync();

  const options = program.opts<CliOptions>();
  const args = program.args;

  // Completions mode - output and exit
  if (options.completions) {
    const shell = options.completions;
    if (!isValidShell(shell)) {
      logError(`Unknown shell "${shell}"`, "Supported shells: bash, zsh, fish");
      process.exit(1);
    }
    console.log(getCompletion(shell));
    return;
  }

  setVerboseEnabled(Boolean(options.verbose));
  setDebugEnabled(Boolean(options.debug));

  // Fail fast on bad parameters before touching the filesystem
  const params = validateParams({
    n: options.nValue,
    threshold: options.threshold,
    maxResults: options.maxResults,
    format: options.format,
  });

  const directory = options.dir ?? args[0] ?? process.cwd();
  const discovered = discoverSources(directory, { recursive: Boolean(options.recursive), extensions: options.ext });
  verbose(`Found ${discovered.sources.length} file(s) in ${directory}`);

  const result = detectSimilarity(discovered.sources, params);
  const report = withDiscoverySkips(result, discovered.skipped);

  const outputOpts: OutputOptions = {
    outFile: options.out ?? null,
    quiet: Boolean(options.quiet),
    json: Boolean(options.json),
  };
  outputReport(report, outputOpts, VERSION);

  if (!outputOpts.quiet) {
    printExclusions(report);
    logInfo(formatStats(report.stats, report.results.length));
  }
}

main().catch((err: unknown) => {
  if (err instanceof InvalidParameterError) {
    const flag = PARAM_FLAGS[err.parameter];
    logError(err.message, flag ? `Check the value passed to ${flag}` : undefined);
  } else if (err instanceof SourceUnavailableError) {
    logError(err.message, "Pass a readable directory with -d or as the first argument");
  } else {
    logError(err instanceof Error ? err.message : String(err));
  }
  process.exit(1);
});
