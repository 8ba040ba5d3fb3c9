/**
 * Core error handling for splitstat
 *
 * Every failure the engine raises is an ExperimentError carrying:
 * - A structured error code
 * - The category the code belongs to (configuration, assignment, ...)
 * - Optional context for debugging
 */

/**
 * Error codes covering every failure the engine can raise
 */
export enum ErrorCode {
  // Configuration errors
  INVALID_CONFIG = 'INVALID_CONFIG',
  INVALID_BUCKET_RANGE = 'INVALID_BUCKET_RANGE',
  OVERLAPPING_BUCKETS = 'OVERLAPPING_BUCKETS',
  MISSING_CONTROL = 'MISSING_CONTROL',

  // Assignment errors
  UNASSIGNED_BUCKET = 'UNASSIGNED_BUCKET',

  // Arithmetic errors
  DIVISION_BY_ZERO = 'DIVISION_BY_ZERO',

  // Correction errors
  UNSUPPORTED_CORRECTION = 'UNSUPPORTED_CORRECTION',
  INVALID_PVALUE = 'INVALID_PVALUE',

  // Input errors
  INVALID_RECORD = 'INVALID_RECORD',
  INVALID_INPUT = 'INVALID_INPUT',

  // System errors
  INTERNAL_ERROR = 'INTERNAL_ERROR',
}

export type ErrorCategory =
  | 'configuration'
  | 'assignment'
  | 'arithmetic'
  | 'correction'
  | 'input'
  | 'internal';

const CATEGORY_BY_CODE: Record<ErrorCode, ErrorCategory> = {
  [ErrorCode.INVALID_CONFIG]: 'configuration',
  [ErrorCode.INVALID_BUCKET_RANGE]: 'configuration',
  [ErrorCode.OVERLAPPING_BUCKETS]: 'configuration',
  [ErrorCode.MISSING_CONTROL]: 'configuration',
  [ErrorCode.UNASSIGNED_BUCKET]: 'assignment',
  [ErrorCode.DIVISION_BY_ZERO]: 'arithmetic',
  [ErrorCode.UNSUPPORTED_CORRECTION]: 'correction',
  [ErrorCode.INVALID_PVALUE]: 'correction',
  [ErrorCode.INVALID_RECORD]: 'input',
  [ErrorCode.INVALID_INPUT]: 'input',
  [ErrorCode.INTERNAL_ERROR]: 'internal',
};

/**
 * Look up the category an error code belongs to
 */
export function errorCategory(code: ErrorCode): ErrorCategory {
  return CATEGORY_BY_CODE[code];
}

/**
 * Error class for the engine with structured error codes and context
 *
 * @example
 * ```typescript
 * throw new ExperimentError(
 *   ErrorCode.UNASSIGNED_BUCKET,
 *   'Subject u1 falls in bucket 97, which no group covers',
 *   { subjectId: 'u1', bucket: 97 }
 * );
 * ```
 */
export class ExperimentError extends Error {
  /**
   * @param code - Structured error code for categorization
   * @param message - Human-readable error message
   * @param context - Optional context object for debugging
   */
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'ExperimentError';

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, ExperimentError);
    }
  }

  /**
   * Category of this error's code
   */
  get category(): ErrorCategory {
    return errorCategory(this.code);
  }

  /**
   * Create a formatted string representation of the error
   * Includes code, message, and context for debugging
   */
  toString(): string {
    const contextStr = this.context ? ` Context: ${JSON.stringify(this.context)}` : '';
    return `${this.name} [${this.code}]: ${this.message}${contextStr}`;
  }

  /**
   * Check if this error matches a specific error code
   */
  is(code: ErrorCode): boolean {
    return this.code === code;
  }

  /**
   * Check if this error is in a set of error codes
   */
  isOneOf(codes: ErrorCode[]): boolean {
    return codes.includes(this.code);
  }
}

/**
 * Type guard to check if an error is an ExperimentError
 */
export function isExperimentError(error: unknown): error is ExperimentError {
  return error instanceof ExperimentError;
}

/**
 * Wrap an unknown thrown value as an ExperimentError
 */
export function wrapError(
  error: unknown,
  code: ErrorCode = ErrorCode.INTERNAL_ERROR
): ExperimentError {
  if (isExperimentError(error)) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);
  const context =
    error instanceof Error ? { originalStack: error.stack } : { originalError: error };

  return new ExperimentError(code, message, context);
}
