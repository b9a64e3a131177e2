/**
 * Configuration constants for shingle comparison.
 * Centralizes defaults so the CLI and library agree.
 */

/**
 * How source text is turned into prose before tokenizing.
 */
export type SourceFormat = "plain" | "markdown";

export const SOURCE_FORMATS: readonly SourceFormat[] = ["plain", "markdown"];

/**
 * Defaults for a detection run.
 */
export const DETECTION_DEFAULTS = {
  /** Words per shingle. 4 flags a couple of shared phrases; 15 needs whole shared sentences. */
  N_VALUE: 4,
  /** Pairs must have similarity strictly above this (0-1) to be reported. */
  THRESHOLD: 0.5,
  /** Text format of every source */
  FORMAT: "plain",
} as const;

/**
 * Bounds enforced by parameter validation.
 */
export const PARAM_LIMITS = {
  MIN_N: 1,
  MIN_THRESHOLD: 0,
  MAX_THRESHOLD: 1,
  MIN_RESULTS: 0,
} as const;

/**
 * Rendering settings for the text report
 */
export const RENDER_CONFIG = {
  /** Digits after the decimal point for similarity */
  SIMILARITY_DIGITS: 4,
  /** Spaces between justified columns */
  COLUMN_GAP: 2,
} as const;
