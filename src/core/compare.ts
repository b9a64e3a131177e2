/**
 * Pairwise comparison of two documents' shingle sets.
 */

import type { Document } from "./document.js";
import { DegenerateDocumentError } from "../errors.js";

/**
 * Overlap between two documents. `ids` is sorted, so the pair is the same
 * whichever order the documents were compared in.
 */
export interface ComparisonResult {
  readonly ids: readonly [string, string];
  /** Number of shingles the two documents share */
  readonly overlap: number;
  /** Size of the smaller shingle set */
  readonly denominator: number;
  /** overlap / denominator, in [0, 1] */
  readonly similarity: number;
}

/** Code-unit order; independent of the host locale. */
export function compareIds(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Count elements present in both sets. Iterates the smaller one.
 */
export function intersectionSize(a: ReadonlySet<string>, b: ReadonlySet<string>): number {
  const [small, large] = a.size <= b.size ? [a, b] : [b, a];
  let count = 0;
  for (const item of small) {
    if (large.has(item)) count++;
  }
  return count;
}

/**
 * Compare two documents.
 * @throws DegenerateDocumentError if either document has no shingles
 */
export function compareDocuments(a: Document, b: Document): ComparisonResult {
  for (const doc of [a, b]) {
    if (doc.shingles.size === 0) {
      throw new DegenerateDocumentError(doc.id, doc.tokenCount);
    }
  }

  const overlap = intersectionSize(a.shingles, b.shingles);
  const denominator = Math.min(a.shingles.size, b.shingles.size);
  const ids: [string, string] = compareIds(a.id, b.id) <= 0 ? [a.id, b.id] : [b.id, a.id];

  return Object.freeze({ ids, overlap, denominator, similarity: overlap / denominator });
}
