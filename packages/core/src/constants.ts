/**
 * Global constants for benchrun
 * Keep values environment-agnostic and dependency-free.
 */

/** Product name used by the CLI and log bindings */
export const BENCHRUN_NAME = 'benchrun' as const;

/** Name of the configuration file expected at the root of every test suite */
export const SUITE_CONFIG_FILENAME = 'test-suite.json' as const;

/** Output directory used when none is given */
export const DEFAULT_OUT_DIR = 'out' as const;

/** Separator between the file path and the name in a test case id */
export const TEST_CASE_ID_SEPARATOR = '::' as const;
