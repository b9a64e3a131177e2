/**
 * Source discovery: walk a directory and hand its files to the core as
 * lazily-read sources.
 */

import { readdirSync, readFileSync, realpathSync, statSync, type Stats } from "node:fs";
import { extname, join, relative, resolve, sep } from "node:path";
import type { SourceInput } from "../core/document.js";
import type { DetectionReport, SkippedSource } from "../core/detect.js";
import { compareIds } from "../core/compare.js";
import { NotFileOrDirectoryError, SourceUnavailableError } from "../errors.js";
import { verbose } from "../debug.js";

export interface DiscoverOptions {
  /** Descend into subdirectories */
  recursive?: boolean;
  /** Only include files with these extensions (e.g. ".txt" or "md") */
  extensions?: string[];
}

export interface DiscoveredSources {
  sources: SourceInput[];
  skipped: SkippedSource[];
}

function normalizeExtensions(extensions: string[] | undefined): Set<string> | null {
  if (!extensions || extensions.length === 0) return null;
  return new Set(extensions.map((ext) => (ext.startsWith(".") ? ext : `.${ext}`).toLowerCase()));
}

/** Identifier for a file: its path relative to the root, with forward slashes */
function toId(root: string, path: string): string {
  return relative(root, path).split(sep).join("/");
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Collect the files under a directory.
 * Entries that are neither file nor directory (broken symlinks, sockets)
 * and subdirectories that cannot be listed are reported in `skipped`
 * rather than aborting the walk.
 * @throws SourceUnavailableError if the root is missing or not a directory
 */
export function discoverSources(dir: string, options: DiscoverOptions = {}): DiscoveredSources {
  const root = resolve(dir);
  let rootStat: Stats;
  try {
    rootStat = statSync(root);
  } catch (err) {
    throw new SourceUnavailableError(dir, errorMessage(err), { cause: err });
  }
  if (!rootStat.isDirectory()) {
    throw new SourceUnavailableError(dir, "not a directory");
  }

  const extensions = normalizeExtensions(options.extensions);
  const sources: SourceInput[] = [];
  const skipped: SkippedSource[] = [];
  const visited = new Set<string>();

  const walk = (current: string): void => {
    let real: string;
    let names: string[];
    try {
      real = realpathSync(current);
      if (visited.has(real)) return;
      names = readdirSync(current);
    } catch (err) {
      if (current === root) throw new SourceUnavailableError(dir, errorMessage(err), { cause: err });
      // An unreadable subdirectory costs only its own entries
      const id = toId(root, current);
      skipped.push({ id, error: new SourceUnavailableError(id, errorMessage(err), { cause: err }) });
      return;
    }
    visited.add(real);

    verbose(`Fetching documents from ${current}`);
    for (const name of names) {
      const path = join(current, name);
      const id = toId(root, path);

      let stat: Stats;
      try {
        stat = statSync(path);
      } catch {
        skipped.push({ id, error: new NotFileOrDirectoryError(id) });
        continue;
      }

      if (stat.isDirectory()) {
        if (options.recursive) walk(path);
      } else if (stat.isFile()) {
        if (extensions && !extensions.has(extname(name).toLowerCase())) continue;
        sources.push({ id, source: () => readFileSync(path) });
      } else {
        skipped.push({ id, error: new NotFileOrDirectoryError(id) });
      }
    }
  };

  walk(root);

  sources.sort((a, b) => compareIds(a.id, b.id));
  skipped.sort((a, b) => compareIds(a.id, b.id));
  return { sources, skipped };
}

/**
 * Fold the entries discovery had to skip into a detection report, so the
 * skipped list and the source count cover the whole directory.
 */
export function withDiscoverySkips(report: DetectionReport, discoverySkips: readonly SkippedSource[]): DetectionReport {
  const skipped = [...discoverySkips, ...report.skipped].sort((a, b) => compareIds(a.id, b.id));
  return {
    ...report,
    skipped,
    stats: { ...report.stats, sources: report.stats.sources + discoverySkips.length },
  };
}
