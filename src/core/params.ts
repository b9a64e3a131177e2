/**
 * Run parameters and their validation.
 */

import { DETECTION_DEFAULTS, PARAM_LIMITS, SOURCE_FORMATS, type SourceFormat } from "../config.js";
import { InvalidParameterError } from "../errors.js";

/** Immutable inputs to a single detection run. */
export interface DetectionParams {
  /** Words per shingle */
  readonly n: number;
  /** Minimum similarity (exclusive) for a pair to be reported */
  readonly threshold: number;
  /** Keep only this many top-ranked pairs */
  readonly maxResults?: number;
  readonly format: SourceFormat;
}

export type DetectionParamsInput = Partial<DetectionParams>;

function isSourceFormat(value: string): value is SourceFormat {
  return SOURCE_FORMATS.some((format) => format === value);
}

/**
 * @throws InvalidParameterError unless threshold is a finite similarity in [0, 1]
 */
export function validateThreshold(threshold: number): void {
  if (!Number.isFinite(threshold) || threshold < PARAM_LIMITS.MIN_THRESHOLD || threshold > PARAM_LIMITS.MAX_THRESHOLD) {
    throw new InvalidParameterError(
      "threshold",
      `must be a similarity between ${PARAM_LIMITS.MIN_THRESHOLD} and ${PARAM_LIMITS.MAX_THRESHOLD}, got ${threshold}`,
    );
  }
}

/**
 * @throws InvalidParameterError unless maxResults is absent or a non-negative integer
 */
export function validateMaxResults(maxResults: number | undefined): void {
  if (maxResults !== undefined && (!Number.isInteger(maxResults) || maxResults < PARAM_LIMITS.MIN_RESULTS)) {
    throw new InvalidParameterError("maxResults", `must be an integer >= ${PARAM_LIMITS.MIN_RESULTS}, got ${maxResults}`);
  }
}

/**
 * Fill in defaults and check every parameter.
 * @throws InvalidParameterError naming the first bad parameter
 */
export function validateParams(input: DetectionParamsInput = {}): DetectionParams {
  const n = input.n ?? DETECTION_DEFAULTS.N_VALUE;
  const threshold = input.threshold ?? DETECTION_DEFAULTS.THRESHOLD;
  const format = input.format ?? DETECTION_DEFAULTS.FORMAT;
  const { maxResults } = input;

  if (!Number.isInteger(n) || n < PARAM_LIMITS.MIN_N) {
    throw new InvalidParameterError("n", `must be an integer >= ${PARAM_LIMITS.MIN_N}, got ${n}`);
  }
  validateThreshold(threshold);
  validateMaxResults(maxResults);
  if (!isSourceFormat(format)) {
    throw new InvalidParameterError("format", `must be one of ${SOURCE_FORMATS.join(", ")}, got ${format}`);
  }

  return Object.freeze({ n, threshold, maxResults, format });
}
