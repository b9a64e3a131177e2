/**
 * Document construction: source text → tokens → shingle set.
 */

import type { SourceFormat } from "../config.js";
import { SourceUnavailableError } from "../errors.js";
import { decodeText, tokenize } from "../text/tokens.js";
import { buildShingles } from "../text/shingles.js";
import { markdownToPlainText } from "../text/parse.js";
import { createDebugLogger } from "../debug.js";

const debug = createDebugLogger("document");

/**
 * Raw text for one document. A function source is called exactly once,
 * so it can defer the actual read until the document is built.
 */
export type TextSource = string | Uint8Array | (() => string | Uint8Array);

/** A named source handed to the core by a discovery component. */
export interface SourceInput {
  id: string;
  source: TextSource;
}

/** An identifier together with its shingle set. Frozen once built. */
export interface Document {
  readonly id: string;
  readonly shingles: ReadonlySet<string>;
  /** Token count before shingling */
  readonly tokenCount: number;
}

export interface BuildOptions {
  format?: SourceFormat;
}

function readSource(id: string, source: TextSource): string {
  let raw: string | Uint8Array;
  if (typeof source === "function") {
    try {
      raw = source();
    } catch (err) {
      if (err instanceof SourceUnavailableError) throw err;
      const reason = err instanceof Error ? err.message : String(err);
      throw new SourceUnavailableError(id, reason, { cause: err });
    }
  } else {
    raw = source;
  }
  return typeof raw === "string" ? raw : decodeText(raw);
}

/**
 * Build a document from its source.
 * @throws SourceUnavailableError if the source cannot be read at all
 */
export function buildDocument(id: string, source: TextSource, n: number, options: BuildOptions = {}): Document {
  const text = readSource(id, source);
  const prose = options.format === "markdown" ? markdownToPlainText(text) : text;
  const tokens = tokenize(prose);
  const shingles = buildShingles(tokens, n);

  debug(`${id}: ${tokens.length} tokens, ${shingles.size} shingles`);

  return Object.freeze({ id, shingles, tokenCount: tokens.length });
}

/**
 * A document with no shingles (fewer words than the shingle length).
 */
export function isDegenerate(doc: Document): boolean {
  return doc.shingles.size === 0;
}
