/**
 * Pipeline Error Types
 *
 * Custom error classes for the ingestion and aggregation pipeline.
 * Per-line problems never surface as errors (the decoder returns a skip
 * result); these classes cover the store boundary, startup configuration
 * and whole-file failures.
 */

/**
 * Raw value outside the range admitted by the fact store.
 *
 * Thrown before anything is written. Ingestion treats it as a
 * reject-and-continue condition for the offending line.
 */
export class ConstraintViolationError extends Error {
  /**
   * @param field - Column the value was destined for
   * @param value - Offending raw value
   * @param min - Inclusive lower bound
   * @param max - Inclusive upper bound
   */
  constructor(
    public readonly field: string,
    public readonly value: number,
    public readonly min: number,
    public readonly max: number
  ) {
    super(`${field}=${value} outside allowed range [${min}, ${max}]`);
    this.name = 'ConstraintViolationError';

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, ConstraintViolationError);
    }
  }
}

/**
 * Fatal startup problem: unreadable schema, unsupported database URL,
 * invalid config file. No pipeline run begins after one of these.
 */
export class ConfigurationError extends Error {
  constructor(message: string, public readonly cause?: unknown) {
    super(message);
    this.name = 'ConfigurationError';

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, ConfigurationError);
    }
  }
}

/**
 * Unrecoverable failure while processing one source file.
 *
 * Carries the file and the line being processed when the cause escaped,
 * so the lifecycle manager can log where the file stopped.
 */
export class FileProcessingError extends Error {
  constructor(
    public readonly fileName: string,
    public readonly lineNumber: number | null,
    public readonly cause: unknown
  ) {
    super(
      `Failed to process ${fileName}` +
        (lineNumber !== null ? ` at line ${lineNumber}` : '') +
        `: ${cause instanceof Error ? cause.message : String(cause)}`
    );
    this.name = 'FileProcessingError';

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, FileProcessingError);
    }
  }
}

/**
 * Type guard for constraint violations raised anywhere below the store.
 */
export function isConstraintViolation(error: unknown): error is ConstraintViolationError {
  return error instanceof ConstraintViolationError;
}
