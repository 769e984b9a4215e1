/**
 * Country Triangulator Error Types
 *
 * Structured errors for rejected input and unreadable datasets. Scoring
 * never returns partial results: any of these aborts the whole operation.
 */

/**
 * Base class for all triangulator errors
 */
export class TriangulatorError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'TriangulatorError';

    // Maintain proper stack trace for where error was thrown (V8 only)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }
}

/**
 * Why an input was rejected
 */
export type InvalidInputReason =
  | 'unknown-country'
  | 'negative-distance'
  | 'invalid-distance'
  | 'invalid-direction'
  | 'negative-tolerance'
  | 'invalid-penalty'
  | 'invalid-coordinates'
  | 'duplicate-country'
  | 'invalid-country-name'
  | 'invalid-hint';

/**
 * Error thrown when a hint, scoring option or centroid record is invalid
 *
 * Raised before any scoring work begins. `hintIndex` is set when the
 * problem belongs to a specific hint.
 */
export class InvalidInputError extends TriangulatorError {
  /**
   * @param message - Human-readable error message
   * @param reason - Machine-readable rejection reason
   * @param hintIndex - Zero-based index of the offending hint
   */
  constructor(
    message: string,
    public readonly reason: InvalidInputReason,
    public readonly hintIndex?: number
  ) {
    super(message);
    this.name = 'InvalidInputError';
  }
}

/**
 * Error thrown when a centroid dataset file cannot be read or parsed
 */
export class DatasetLoadError extends TriangulatorError {
  constructor(
    message: string,
    public readonly path: string,
    public readonly originalError?: unknown
  ) {
    super(message);
    this.name = 'DatasetLoadError';
  }
}
