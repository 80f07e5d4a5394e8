import { setTimeout as sleep } from 'node:timers/promises';
import {
  BenchrunError,
  type DriverTestStatus,
  ErrorCode,
  ErrorHelpers,
  err,
  ok,
  type RunTestRequest,
  type Suite,
  type TestDriver,
  testCaseId
} from '@benchrun/core';

/**
 * What the fake driver does for a case: report a status, return a runner
 * error, or throw
 */
export type FakeOutcome = DriverTestStatus['state'] | 'runner-error' | 'throw';

export type FakeDriverOptions = {
  /** Suite returned by discover() */
  suite?: Suite;
  /**
   * Outcomes keyed by `target/path::name` or `path::name`; cases not listed
   * pass
   */
  outcomes?: Record<string, FakeOutcome>;
  delayMs?: number;
  onRun?: (request: RunTestRequest) => void;
};

export type FakeDriverCall = {
  target: string;
  testCaseId: string;
  outDir: string;
};

export type FakeDriver = TestDriver & {
  readonly calls: FakeDriverCall[];
};

export const FAKE_SKIP_MESSAGE = 'skipped by fake driver';

const toStatus = (outcome: DriverTestStatus['state']): DriverTestStatus =>
  outcome === 'skipped' ? { state: 'skipped', message: FAKE_SKIP_MESSAGE } : { state: outcome };

/**
 * In-process driver that records every run and answers from a script
 */
export function createFakeDriver(options: FakeDriverOptions = {}): FakeDriver {
  const calls: FakeDriverCall[] = [];

  return {
    name: 'fake',
    calls,

    defaultTestFilePatterns: () => ['*.fake'],

    discover: async (suiteDir) => {
      if (!options.suite) {
        return err(ErrorHelpers.unknownSuite(suiteDir));
      }
      return ok(options.suite);
    },

    run: async (request) => {
      const id = testCaseId(request.testCase);
      calls.push({ target: request.target, testCaseId: id, outDir: request.outDir });
      options.onRun?.(request);

      if (options.delayMs !== undefined) {
        await sleep(options.delayMs);
      }

      const outcome = options.outcomes?.[`${request.target}/${id}`] ?? options.outcomes?.[id];
      switch (outcome) {
        case undefined:
          return ok({ status: { state: 'passed' }, driverOutput: `${id} on ${request.target}` });
        case 'runner-error':
          return err(
            new BenchrunError(ErrorCode.E_DRIVER_RUN_FAILED, `cannot run \`${id}\``, {
              context: { target: request.target, testCaseId: id }
            })
          );
        case 'throw':
          throw new Error(`driver crashed on \`${id}\``);
        default:
          return ok({ status: toStatus(outcome) });
      }
    }
  };
}
