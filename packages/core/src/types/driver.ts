/**
 * Test driver contract
 *
 * A driver knows how to find the test cases of a suite and how to run one of
 * them. The engine treats run() as an opaque, potentially slow call.
 */

import type { BenchrunError } from '../errors/index.js';
import type { SuiteConfig } from '../schemas.js';
import type { Result } from '../utils/result.js';
import type { Suite, TestCase } from './suite.js';

/**
 * Outcome of a test case that the driver managed to execute
 */
export type DriverTestStatus =
  | { state: 'passed' }
  | { state: 'failed' }
  | { state: 'skipped'; message: string };

export type RunTestOutput = {
  status: DriverTestStatus;
  /** Free-form driver output, e.g. the path of the log file */
  driverOutput?: string;
};

export type RunTestRequest = {
  suiteDir: string;
  config: SuiteConfig;
  target: string;
  testCase: TestCase;
  /** Directory reserved for this case's logs and data */
  outDir: string;
  signal?: AbortSignal;
};

export type TestDriver = {
  readonly name: string;

  /** Patterns used when the suite config gives none */
  defaultTestFilePatterns(): string[];

  /**
   * Build the suite: files sorted by path, each with its setup first, its tests
   * in a stable order and its teardown last. Duplicate names are an error.
   */
  discover(suiteDir: string, config: SuiteConfig): Promise<Result<Suite, BenchrunError>>;

  /**
   * Run one test case. An error result is a runner failure: the driver could
   * not execute the case at all.
   */
  run(request: RunTestRequest): Promise<Result<RunTestOutput, BenchrunError>>;
};
