/**
 * Type exports for benchrun core
 */

export type { DriverTestStatus, RunTestOutput, RunTestRequest, TestDriver } from './driver.js';
export type { ExecutionView, Reporter, TestCaseRecord } from './reporter.js';
export { createSilentReporter } from './reporter.js';
export type {
  ShouldSkip,
  SkipReason,
  SkipReasonKind,
  Statistics,
  SuiteStatus,
  TestCaseState,
  TestCaseStatus
} from './status.js';
export {
  combineSkip,
  compareSkipReasons,
  describeSkipReason,
  isFailureStatus,
  NO_SKIP,
  raiseSkip,
  SKIP_REASON_RANK,
  skipWith
} from './status.js';
export type { Suite, SuiteFixture, TestCase, TestFile } from './suite.js';
export {
  createSuite,
  createTestCase,
  createTestFile,
  findDuplicateTestCase,
  testCaseId
} from './suite.js';
