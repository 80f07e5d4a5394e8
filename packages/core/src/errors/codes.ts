/**
 * Error codes and severity levels for benchrun
 */

export enum ErrorCode {
  // Configuration Errors (E_CONFIG_*)
  E_CONFIG_NOT_FOUND = 'E_CONFIG_NOT_FOUND',
  E_CONFIG_READ_FAILED = 'E_CONFIG_READ_FAILED',
  E_CONFIG_PARSE_ERROR = 'E_CONFIG_PARSE_ERROR',
  E_CONFIG_VALIDATION_FAILED = 'E_CONFIG_VALIDATION_FAILED',

  // Suite Errors (E_SUITE_*)
  E_SUITE_UNKNOWN = 'E_SUITE_UNKNOWN',
  E_SUITE_DUPLICATE_TEST_CASE = 'E_SUITE_DUPLICATE_TEST_CASE',

  // Test Driver Errors (E_DRIVER_*)
  E_DRIVER_UNKNOWN = 'E_DRIVER_UNKNOWN',
  E_DRIVER_TEST_FILE_EXEC = 'E_DRIVER_TEST_FILE_EXEC',
  E_DRIVER_SPAWN_FAILED = 'E_DRIVER_SPAWN_FAILED',
  E_DRIVER_RUN_FAILED = 'E_DRIVER_RUN_FAILED',

  // Execution State Errors (E_STATE_*)
  E_STATE_STATUS_RESET = 'E_STATE_STATUS_RESET',
  E_STATE_UNKNOWN_TEST_CASE = 'E_STATE_UNKNOWN_TEST_CASE',

  // System Errors (E_SYSTEM_*)
  E_SYSTEM_FS_ERROR = 'E_SYSTEM_FS_ERROR',
  E_SYSTEM_UNKNOWN = 'E_SYSTEM_UNKNOWN'
}

export enum ErrorSeverity {
  CRITICAL = 'critical', // Programming error, the run cannot continue
  ERROR = 'error', // Operation failed
  WARNING = 'warning', // Operation completed with issues
  INFO = 'info'
}

/**
 * Extended error information
 */
export type ErrorContext = {
  suiteDir?: string;
  target?: string;
  testCaseId?: string;
  configPath?: string;
  driver?: string;
  timestamp?: Date;
  stack?: string;
  [key: string]: unknown;
};
