/**
 * Library entry point: the comparison core without the CLI.
 */

export { tokenize, normalizeWord, decodeText } from "./text/tokens.js";
export { buildShingles, maxShingleCount } from "./text/shingles.js";
export { markdownToPlainText } from "./text/parse.js";
export { buildDocument, isDegenerate, type Document, type SourceInput, type TextSource } from "./core/document.js";
export { compareDocuments, type ComparisonResult } from "./core/compare.js";
export { comparePairs, rankDocuments, compareResults, type RankOptions } from "./core/rank.js";
export { validateParams, type DetectionParams, type DetectionParamsInput } from "./core/params.js";
export {
  detectSimilarity,
  type DetectionReport,
  type DetectionStats,
  type SkippedSource,
} from "./core/detect.js";
export { DETECTION_DEFAULTS, type SourceFormat } from "./config.js";
export {
  DetectionError,
  SourceUnavailableError,
  NotFileOrDirectoryError,
  DegenerateDocumentError,
  InvalidParameterError,
} from "./errors.js";
