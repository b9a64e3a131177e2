/**
 * Error types raised by the detection pipeline and its collaborators.
 */

/** Base class so callers can catch every detection failure in one place. */
export class DetectionError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * A nominated source could not be read at all.
 * The affected document is skipped; the rest of the run continues.
 */
export class SourceUnavailableError extends DetectionError {
  readonly id: string;

  constructor(id: string, reason: string, options?: { cause?: unknown }) {
    super(`Cannot read source "${id}": ${reason}`, options);
    this.id = id;
  }
}

/** Discovery found an entry that is neither a file nor a directory (e.g. a broken symlink). */
export class NotFileOrDirectoryError extends SourceUnavailableError {
  constructor(id: string) {
    super(id, "neither file nor directory");
  }
}

/** A document produced zero shingles for the chosen shingle length. */
export class DegenerateDocumentError extends DetectionError {
  readonly id: string;
  readonly tokenCount: number;

  constructor(id: string, tokenCount: number) {
    super(`Document "${id}" is too short to compare (${tokenCount} word${tokenCount === 1 ? "" : "s"})`);
    this.id = id;
    this.tokenCount = tokenCount;
  }
}

/** A run parameter is out of range. Raised before any comparison work. */
export class InvalidParameterError extends DetectionError {
  readonly parameter: string;
  readonly reason: string;

  constructor(parameter: string, reason: string) {
    super(`Invalid ${parameter}: ${reason}`);
    this.parameter = parameter;
    this.reason = reason;
  }
}
