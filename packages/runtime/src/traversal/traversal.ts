/**
 * Resumable walk over a suite
 *
 * The traversal keeps an explicit state and a cursor (file index, case index)
 * so that several of them can be advanced independently, one case at a time.
 * Order: suite setup, then for every file its setup, its cases and its
 * teardown, then the suite teardown.
 */

import {
  combineSkip,
  NO_SKIP,
  raiseSkip,
  type ShouldSkip,
  type Suite,
  type TestCase
} from '@benchrun/core';

/**
 * Step of the walk a yielded case belongs to
 */
export type TraversalPhase =
  | 'suite-setup'
  | 'file-setup'
  | 'test-case'
  | 'file-teardown'
  | 'suite-teardown';

export type TraversalState = TraversalPhase | 'done' | 'aborted';

export type Visit = {
  readonly testCase: TestCase;
  /** Advisory: the caller decides whether the case runs */
  readonly shouldSkip: ShouldSkip;
  readonly phase: TraversalPhase;
};

/**
 * Runs one visit and resolves to true when the case failed
 */
export type Visitor = (visit: Visit) => Promise<boolean>;

export class Traversal {
  private state: TraversalState = 'suite-setup';
  private fileIndex = 0;
  private caseIndex = 0;
  private lastPhase: TraversalPhase | undefined;

  // Suite flag is never cleared; the file flag is cleared at every file setup
  private suiteFlag: ShouldSkip = NO_SKIP;
  private fileFlag: ShouldSkip = NO_SKIP;

  constructor(private readonly suite: Suite) {}

  get currentState(): TraversalState {
    return this.state;
  }

  isComplete(): boolean {
    return this.state === 'done' || this.state === 'aborted';
  }

  /**
   * Yield the next case, or undefined once the walk is complete.
   * States with nothing to yield are passed through within the same call.
   */
  next(): Visit | undefined {
    for (;;) {
      switch (this.state) {
        case 'suite-setup': {
          this.state = this.suite.files.length > 0 ? 'file-setup' : 'suite-teardown';
          const setup = this.suite.fixture.setup;
          if (setup) {
            return this.visit(setup, 'suite-setup', NO_SKIP);
          }
          break;
        }

        case 'file-setup': {
          const file = this.suite.files[this.fileIndex];
          if (!file) {
            this.state = 'suite-teardown';
            break;
          }
          this.fileFlag = NO_SKIP;
          this.caseIndex = 0;
          this.state = 'test-case';
          if (file.setup) {
            return this.visit(file.setup, 'file-setup', this.combined());
          }
          break;
        }

        case 'test-case': {
          const testCase = this.suite.files[this.fileIndex]?.testCases[this.caseIndex];
          if (!testCase) {
            this.state = 'file-teardown';
            break;
          }
          this.caseIndex++;
          return this.visit(testCase, 'test-case', this.combined());
        }

        case 'file-teardown': {
          const teardown = this.suite.files[this.fileIndex]?.teardown;
          const shouldSkip = this.combined();
          this.fileIndex++;
          this.state = this.fileIndex < this.suite.files.length ? 'file-setup' : 'suite-teardown';
          if (teardown) {
            return this.visit(teardown, 'file-teardown', shouldSkip);
          }
          break;
        }

        case 'suite-teardown': {
          this.state = 'done';
          const teardown = this.suite.fixture.teardown;
          if (teardown) {
            return this.visit(teardown, 'suite-teardown', this.suiteFlag);
          }
          break;
        }

        case 'done':
        case 'aborted':
          return undefined;
      }
    }
  }

  /**
   * Report that the last yielded case failed. Only setup failures have an
   * effect: they raise the flag of their scope.
   */
  reportFailure(): void {
    if (this.lastPhase === 'suite-setup') {
      this.suiteFlag = raiseSkip(this.suiteFlag, { kind: 'test-suite-setup-error' });
    } else if (this.lastPhase === 'file-setup') {
      this.fileFlag = raiseSkip(this.fileFlag, { kind: 'test-case-setup-error' });
    }
  }

  /**
   * Advance by one case through the visitor. Resolves to true once the walk is
   * complete; a step that finds nothing left yields no case.
   */
  async step(visitor: Visitor): Promise<boolean> {
    const visit = this.next();
    if (visit) {
      const failed = await visitor(visit);
      if (failed) {
        this.reportFailure();
      }
    }
    return this.isComplete();
  }

  /**
   * Stop the walk; every later step reports completion
   */
  abort(): void {
    this.state = 'aborted';
  }

  private combined(): ShouldSkip {
    return combineSkip(this.suiteFlag, this.fileFlag);
  }

  private visit(testCase: TestCase, phase: TraversalPhase, shouldSkip: ShouldSkip): Visit {
    this.lastPhase = phase;
    return { testCase, shouldSkip, phase };
  }
}

/**
 * Every case of a suite in traversal order
 */
export function listTestCases(suite: Suite): TestCase[] {
  const traversal = new Traversal(suite);
  const testCases: TestCase[] = [];
  for (let visit = traversal.next(); visit; visit = traversal.next()) {
    testCases.push(visit.testCase);
  }
  return testCases;
}
