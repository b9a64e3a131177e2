/**
 * Ranking and filtering of pairwise comparisons.
 *
 * Policy: a pair is kept when its similarity is strictly above the
 * threshold. Survivors are ordered by similarity (descending), then
 * overlap (descending), then by their identifiers, so the output does not
 * depend on input order.
 */

import type { Document } from "./document.js";
import { compareDocuments, compareIds, type ComparisonResult } from "./compare.js";
import { validateMaxResults, validateThreshold } from "./params.js";
import { InvalidParameterError } from "../errors.js";
import { createDebugLogger } from "../debug.js";

const debug = createDebugLogger("rank");

export interface RankOptions {
  threshold: number;
  maxResults?: number;
}

/**
 * Sort order for results: most similar first, deterministic ties.
 */
export function compareResults(a: ComparisonResult, b: ComparisonResult): number {
  return (
    b.similarity - a.similarity ||
    b.overlap - a.overlap ||
    compareIds(a.ids[0], b.ids[0]) ||
    compareIds(a.ids[1], b.ids[1])
  );
}

/**
 * @throws InvalidParameterError if two entries share an id
 */
export function assertUniqueIds(entries: readonly { id: string }[]): void {
  const seen = new Set<string>();
  for (const { id } of entries) {
    if (seen.has(id)) {
      throw new InvalidParameterError("documents", `duplicate identifier "${id}"`);
    }
    seen.add(id);
  }
}

/**
 * Compare every unordered pair of distinct documents exactly once.
 * Returns m(m-1)/2 results, unfiltered and unsorted.
 * @throws DegenerateDocumentError if any document has no shingles
 */
export function comparePairs(documents: readonly Document[]): ComparisonResult[] {
  assertUniqueIds(documents);

  const results: ComparisonResult[] = [];
  for (let i = 0; i < documents.length; i++) {
    for (let j = i + 1; j < documents.length; j++) {
      results.push(compareDocuments(documents[i], documents[j]));
    }
  }
  return results;
}

/**
 * Keep pairs above the threshold, then sort.
 */
export function filterResults(results: readonly ComparisonResult[], threshold: number): ComparisonResult[] {
  return results.filter((r) => r.similarity > threshold).sort(compareResults);
}

/**
 * Keep the first maxResults entries of an already sorted list.
 */
export function capResults(sorted: ComparisonResult[], maxResults?: number): ComparisonResult[] {
  return maxResults === undefined ? sorted : sorted.slice(0, maxResults);
}

/**
 * Rank all pairs of documents. Capping happens after sorting.
 * @throws InvalidParameterError before any comparison if an option is out of range
 */
export function rankDocuments(documents: readonly Document[], options: RankOptions): ComparisonResult[] {
  validateThreshold(options.threshold);
  validateMaxResults(options.maxResults);

  const all = comparePairs(documents);
  const kept = filterResults(all, options.threshold);
  debug(`${all.length} pairs compared, ${kept.length} above threshold ${options.threshold}`);

  return capResults(kept, options.maxResults);
}
