/**
 * Skip directives and execution statuses
 */

/**
 * Why a test case is skipped. Ranked from the least to the most important:
 * a reason given by the test case itself, a failed file setup, a failed
 * suite setup.
 */
export type SkipReason =
  | { kind: 'test-case'; message: string }
  | { kind: 'test-case-setup-error' }
  | { kind: 'test-suite-setup-error' };

export type SkipReasonKind = SkipReason['kind'];

export const SKIP_REASON_RANK: Record<SkipReasonKind, number> = {
  'test-case': 0,
  'test-case-setup-error': 1,
  'test-suite-setup-error': 2
};

/**
 * Advice given by a traversal about a test case
 */
export type ShouldSkip = { skip: false } | { skip: true; reason: SkipReason };

export const NO_SKIP: ShouldSkip = Object.freeze({ skip: false });

export function skipWith(reason: SkipReason): ShouldSkip {
  return { skip: true, reason };
}

/**
 * Negative when a ranks below b, positive when above, zero on equal rank
 */
export function compareSkipReasons(a: SkipReason, b: SkipReason): number {
  return SKIP_REASON_RANK[a.kind] - SKIP_REASON_RANK[b.kind];
}

/**
 * Raise a skip directive with a reason; the higher-ranked reason is kept
 */
export function raiseSkip(current: ShouldSkip, reason: SkipReason): ShouldSkip {
  if (!current.skip || compareSkipReasons(reason, current.reason) > 0) {
    return skipWith(reason);
  }
  return current;
}

/**
 * Combine two directives: skip when either says so, with the higher-ranked reason
 */
export function combineSkip(a: ShouldSkip, b: ShouldSkip): ShouldSkip {
  if (!b.skip) return a;
  return raiseSkip(a, b.reason);
}

export function describeSkipReason(reason: SkipReason): string {
  switch (reason.kind) {
    case 'test-case':
      return reason.message;
    case 'test-case-setup-error':
      return 'test case setup failed';
    case 'test-suite-setup-error':
      return 'test suite setup failed';
  }
}

export type TestCaseStatus =
  | { state: 'not-run' }
  | { state: 'running' }
  | { state: 'passed' }
  | { state: 'failed' }
  | { state: 'runner-failed'; message: string }
  | { state: 'skipped'; reason: SkipReason }
  | { state: 'dry-run' };

export type TestCaseState = TestCaseStatus['state'];

/**
 * Outcomes that count as a failure of the case, used for setup failure propagation
 */
export function isFailureStatus(status: TestCaseStatus): boolean {
  return status.state === 'failed' || status.state === 'runner-failed';
}

/**
 * Status of a suite for one target
 */
export type SuiteStatus =
  | { state: 'not-run' }
  | { state: 'running' }
  | { state: 'aborted'; reason: string }
  | { state: 'finished' };

export type Statistics = {
  passed: number;
  failed: number;
  runnerFailed: number;
  /** Includes dry-run cases */
  skipped: number;
};
