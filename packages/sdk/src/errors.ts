/**
 * Error types for fortune index and selection operations
 *
 * Invariants:
 * - Errors include the offending source path in the message when one exists
 * - All errors support a `cause` property for wrapping underlying errors
 * - All errors have stable `name` and `code` fields for programmatic handling
 */

/**
 * Base class for all fortune errors
 */
export abstract class FortuneError extends Error {
  abstract readonly code: string;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = this.constructor.name;
    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Thrown when a `.dat` index is malformed
 */
export class CorruptIndexError extends FortuneError {
  readonly code = "E_CORRUPT_INDEX";

  constructor(
    public readonly reason: string,
    public readonly path?: string,
    options?: ErrorOptions
  ) {
    super(path ? `Corrupt index ${path}: ${reason}` : `Corrupt index: ${reason}`, options);
  }
}

/**
 * Thrown when a percentage prefix cannot be parsed or is out of range
 */
export class InvalidWeightError extends FortuneError {
  readonly code = "E_INVALID_WEIGHT";

  constructor(
    public readonly token: string,
    reason: string,
    options?: ErrorOptions
  ) {
    super(`Invalid weight "${token}": ${reason}`, options);
  }
}

/**
 * Thrown when explicit weights add up to more than 100%
 */
export class WeightOverflowError extends FortuneError {
  readonly code = "E_WEIGHT_OVERFLOW";

  constructor(
    public readonly totalPercent: number,
    options?: ErrorOptions
  ) {
    super(`Specified percentages exceed 100% (got ${totalPercent.toFixed(3)}%)`, options);
  }
}

/**
 * Thrown when discovery resolves no usable corpus files
 */
export class NoSourcesFoundError extends FortuneError {
  readonly code = "E_NO_SOURCES";

  constructor(
    public readonly searched: readonly string[],
    options?: ErrorOptions
  ) {
    super(
      searched.length > 0
        ? `No fortune sources found in: ${searched.join(", ")}`
        : "No fortune sources found",
      options
    );
  }
}

/**
 * Thrown when filters or a pattern eliminate every candidate quotation
 */
export class NoMatchingQuotationError extends FortuneError {
  readonly code = "E_NO_MATCH";

  constructor(detail: string, options?: ErrorOptions) {
    super(`No matching quotation: ${detail}`, options);
  }
}

/**
 * Thrown when a search pattern fails to compile
 */
export class InvalidPatternError extends FortuneError {
  readonly code = "E_INVALID_PATTERN";

  constructor(
    public readonly pattern: string,
    options?: ErrorOptions
  ) {
    super(`Invalid pattern: ${pattern}`, options);
  }
}

/**
 * Thrown when a selection request or environment setting fails validation
 */
export class InvalidRequestError extends FortuneError {
  readonly code = "E_INVALID_REQUEST";

  constructor(
    message: string,
    public readonly issues: readonly string[] = [],
    options?: ErrorOptions
  ) {
    super(issues.length > 0 ? `${message}: ${issues.join("; ")}` : message, options);
  }
}

/**
 * Thrown when a corpus text file cannot be read
 */
export class SourceReadError extends FortuneError {
  readonly code = "E_SOURCE_READ";

  constructor(filePath: string, options?: ErrorOptions) {
    super(`Failed to read fortune source: ${filePath}`, options);
  }
}

/**
 * Thrown when an index file cannot be written
 */
export class IndexWriteError extends FortuneError {
  readonly code = "E_INDEX_WRITE";

  constructor(filePath: string, options?: ErrorOptions) {
    super(`Failed to write index: ${filePath}`, options);
  }
}

/**
 * Thrown when a directory operation fails
 */
export class DirectoryError extends FortuneError {
  readonly code = "E_DIRECTORY";

  constructor(dirPath: string, options?: ErrorOptions) {
    super(`Directory operation failed: ${dirPath}`, options);
  }
}
