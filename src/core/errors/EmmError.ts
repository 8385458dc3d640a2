/**
 * Core error handling for emm-venn
 *
 * Every failure the library reports is an EmmError carrying:
 * - a structured error code
 * - an optional context record for debugging
 *
 * Numeric degeneracy (Infinity, NaN) in effect measures is never an error.
 */

/**
 * Error codes covering the failures the library can report
 */
export enum ErrorCode {
  // Configuration errors
  INVALID_CONFIG = 'INVALID_CONFIG',

  // User errors
  INVALID_INPUT = 'INVALID_INPUT',

  // Resource errors
  RESOURCE_NOT_FOUND = 'RESOURCE_NOT_FOUND',
  IO_ERROR = 'IO_ERROR',

  // System errors
  INTERNAL_ERROR = 'INTERNAL_ERROR',
}

/**
 * Error class with a structured code and context
 *
 * @example
 * ```typescript
 * throw new EmmError(
 *   ErrorCode.INVALID_CONFIG,
 *   'trialCount must be a positive integer',
 *   { trialCount: 0 }
 * );
 * ```
 */
export class EmmError extends Error {
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
    this.name = 'EmmError';

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, EmmError);
    }
  }

  /**
   * Code, message and context on one line
   */
  override toString(): string {
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
   * Check if this error is in a category of error codes
   */
  isOneOf(codes: ErrorCode[]): boolean {
    return codes.includes(this.code);
  }
}

/**
 * Type guard to check if an error is an EmmError
 */
export function isEmmError(error: unknown): error is EmmError {
  return error instanceof EmmError;
}

/**
 * Wrap an unknown thrown value as EmmError.
 * EmmErrors pass through untouched.
 */
export function wrapError(
  error: unknown,
  code: ErrorCode = ErrorCode.INTERNAL_ERROR,
  context?: Record<string, unknown>
): EmmError {
  if (isEmmError(error)) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);
  const origin =
    error instanceof Error ? { originalStack: error.stack } : { originalError: error };

  return new EmmError(code, message, { ...context, ...origin });
}
