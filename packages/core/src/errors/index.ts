/**
 * Error system for benchrun
 * Standardized error codes and the error class every package throws or returns
 */

import { ErrorCode, type ErrorContext, ErrorSeverity } from './codes.js';

export { ErrorCode, type ErrorContext, ErrorSeverity } from './codes.js';

export type BenchrunErrorOptions = {
  severity?: ErrorSeverity;
  context?: ErrorContext;
  cause?: unknown;
  recoverable?: boolean;
};

export class BenchrunError extends Error {
  public readonly code: ErrorCode;
  public readonly severity: ErrorSeverity;
  public readonly context: ErrorContext;
  public readonly timestamp: Date;
  public readonly recoverable: boolean;

  constructor(code: ErrorCode, message: string, options?: BenchrunErrorOptions) {
    super(message);
    this.name = 'BenchrunError';
    this.code = code;
    this.severity = options?.severity ?? ErrorSeverity.ERROR;
    this.context = options?.context ?? {};
    this.timestamp = new Date();
    this.recoverable = options?.recoverable ?? false;

    if (options?.cause !== undefined) {
      this.cause = options.cause;
      if (options.cause instanceof Error && options.cause.stack) {
        this.context.causeStack = options.cause.stack;
      }
    }

    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Message of the underlying cause, used as the detail line in reports
   */
  get details(): string {
    if (this.cause instanceof Error) {
      return this.cause.message;
    }
    if (typeof this.cause === 'string') {
      return this.cause;
    }
    return '';
  }

  /**
   * Create a critical error (broken invariant)
   */
  static critical(code: ErrorCode, message: string, context?: ErrorContext): BenchrunError {
    return new BenchrunError(code, message, {
      severity: ErrorSeverity.CRITICAL,
      context,
      recoverable: false
    });
  }

  /**
   * Wrap a native error
   */
  static from(
    error: unknown,
    code: ErrorCode = ErrorCode.E_SYSTEM_UNKNOWN,
    context?: ErrorContext
  ): BenchrunError {
    if (error instanceof BenchrunError) {
      return error;
    }

    const message = error instanceof Error ? error.message : String(error);
    return new BenchrunError(code, message, {
      context,
      cause: error instanceof Error ? error : undefined
    });
  }
}

/**
 * Factories for the errors raised in more than one place
 */
export const ErrorHelpers = {
  unknownDriver: (driver: string) =>
    new BenchrunError(ErrorCode.E_DRIVER_UNKNOWN, `unknown test driver \`${driver}\``, {
      context: { driver }
    }),

  unknownSuite: (suiteDir: string) =>
    new BenchrunError(ErrorCode.E_SUITE_UNKNOWN, `unknown test suite at \`${suiteDir}\``, {
      context: { suiteDir }
    }),

  duplicateTestCase: (testCaseId: string, suiteDir: string) =>
    new BenchrunError(
      ErrorCode.E_SUITE_DUPLICATE_TEST_CASE,
      `multiple test functions found with id \`${testCaseId}\``,
      { context: { testCaseId, suiteDir } }
    ),

  statusReset: (testCaseId: string) =>
    BenchrunError.critical(
      ErrorCode.E_STATE_STATUS_RESET,
      `status of test case \`${testCaseId}\` cannot be reset to not-run`,
      { testCaseId }
    )
};
