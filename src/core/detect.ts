/**
 * Detection pipeline - explicit orchestration of the comparison stages.
 *
 * 1. Validate parameters and ids (fail fast, nothing is read on error)
 * 2. Build documents; unreadable sources are skipped and reported
 * 3. Set aside documents too short to produce a shingle
 * 4. Compare every pair, filter by threshold, sort, cap
 */

import { buildDocument, isDegenerate, type Document, type SourceInput } from "./document.js";
import { assertUniqueIds, capResults, comparePairs, filterResults } from "./rank.js";
import type { ComparisonResult } from "./compare.js";
import { validateParams, type DetectionParams, type DetectionParamsInput } from "./params.js";
import { DegenerateDocumentError, SourceUnavailableError } from "../errors.js";
import { createDebugLogger, createTimer } from "../debug.js";

const debug = createDebugLogger("detect");

/** A source that never became a document. */
export interface SkippedSource {
  id: string;
  error: SourceUnavailableError;
}

export interface DetectionStats {
  /** Sources handed in */
  sources: number;
  /** Documents built successfully */
  documents: number;
  /** Documents that took part in comparison */
  compared: number;
  pairsCompared: number;
  /** Pairs above threshold, before maxResults */
  pairsMatched: number;
}

export interface DetectionReport {
  params: DetectionParams;
  results: ComparisonResult[];
  skipped: SkippedSource[];
  /** Documents with no shingles, excluded from comparison */
  degenerate: DegenerateDocumentError[];
  stats: DetectionStats;
}

function buildDocuments(
  sources: readonly SourceInput[],
  params: DetectionParams,
): { documents: Document[]; skipped: SkippedSource[] } {
  const documents: Document[] = [];
  const skipped: SkippedSource[] = [];

  for (const { id, source } of sources) {
    try {
      documents.push(buildDocument(id, source, params.n, { format: params.format }));
    } catch (err) {
      if (!(err instanceof SourceUnavailableError)) throw err;
      debug("skipping", id, err.message);
      skipped.push({ id, error: err });
    }
  }

  return { documents, skipped };
}

/**
 * Run a full comparison over a set of named sources.
 * @throws InvalidParameterError before any source is read, for bad parameters or duplicate ids
 */
export function detectSimilarity(sources: readonly SourceInput[], input?: DetectionParamsInput): DetectionReport {
  const params = validateParams(input);
  assertUniqueIds(sources);
  const timer = createTimer("detect");

  const { documents, skipped } = timer.time("build documents", () => buildDocuments(sources, params));

  const comparable: Document[] = [];
  const degenerate: DegenerateDocumentError[] = [];
  for (const doc of documents) {
    if (isDegenerate(doc)) {
      degenerate.push(new DegenerateDocumentError(doc.id, doc.tokenCount));
    } else {
      comparable.push(doc);
    }
  }
  debug(`${comparable.length} comparable, ${degenerate.length} too short, ${skipped.length} skipped`);

  const all = timer.time("compare pairs", () => comparePairs(comparable));
  const matched = timer.time("rank", () => filterResults(all, params.threshold));
  const results = capResults(matched, params.maxResults);
  timer.done();

  return {
    params,
    results,
    skipped,
    degenerate,
    stats: {
      sources: sources.length,
      documents: documents.length,
      compared: comparable.length,
      pairsCompared: all.length,
      pairsMatched: matched.length,
    },
  };
}
