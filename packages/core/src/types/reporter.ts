/**
 * Reporter contract
 */

import type { TimeInterval } from '../utils/time.js';
import type { Statistics, SuiteStatus, TestCaseStatus } from './status.js';
import type { Suite, TestCase } from './suite.js';

/**
 * Read-only view of one test case's execution for one target
 */
export type TestCaseRecord = {
  readonly status: TestCaseStatus;
  readonly interval: TimeInterval;
  readonly outDir: string;
  readonly driverOutput?: string;
};

/**
 * Read-only view of a suite's execution for one target
 */
export type ExecutionView = {
  readonly target: string;
  readonly status: SuiteStatus;
  record(testCase: TestCase): TestCaseRecord | undefined;
  statistics(): Statistics;
};

export type Reporter = {
  notice(message: string, details?: string): void;
  info(message: string, details?: string): void;
  warning(message: string, details?: string): void;
  error(message: string, details?: string): void;
  errorFrom(error: unknown): void;

  reportTargetList(suite: Suite): void;
  reportTestList(suite: Suite): void;
  /** Called before a case is attempted */
  reportTestCaseStarted(testCase: TestCase, target: string, record: TestCaseRecord): void;
  /** Called exactly once per case, after its outcome is final */
  reportTestCaseResult(testCase: TestCase, target: string, record: TestCaseRecord): void;
  reportExecutionSummary(suite: Suite, executions: readonly ExecutionView[]): void;
  reportTotalTime(durationMs: number): void;
};

/**
 * Reporter that prints nothing
 */
export function createSilentReporter(): Reporter {
  const noop = (): void => {};
  return {
    notice: noop,
    info: noop,
    warning: noop,
    error: noop,
    errorFrom: noop,
    reportTargetList: noop,
    reportTestList: noop,
    reportTestCaseStarted: noop,
    reportTestCaseResult: noop,
    reportExecutionSummary: noop,
    reportTotalTime: noop
  };
}
