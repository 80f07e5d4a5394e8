/**
 * Per-target execution bookkeeping
 *
 * An execution context owns the records of one suite run against one target
 * and performs the side-effecting step of running a single case. It never
 * decides the order of cases; strategies feed it visits from a traversal.
 */

import { mkdir } from 'node:fs/promises';
import { join } from 'node:path';
import {
  BenchrunError,
  type Clock,
  createSilentLogger,
  createSilentReporter,
  ErrorCode,
  ErrorHelpers,
  type ExecutionView,
  flatMap,
  isFailureStatus,
  isOk,
  type Logger,
  type Reporter,
  type RunTestOutput,
  type Statistics,
  type Suite,
  type SuiteStatus,
  type TestCase,
  type TestCaseRecord,
  type TestCaseStatus,
  type TestDriver,
  TimeInterval,
  testCaseId,
  tryCatchAsync
} from '@benchrun/core';
import { listTestCases, type Visit } from '../traversal/traversal.js';

export type ExecutionContextOptions = {
  /** Root of `{outputRoot}/{target}/{file path}` */
  outputRoot: string;
  reporter?: Reporter;
  logger?: Logger;
  /** Record every case that would run as dry-run, without the driver */
  dryRun?: boolean;
  /** Run teardown cases even when a setup failure asks to skip them */
  runTeardownOnSkip?: boolean;
  clock?: Clock;
};

/**
 * Mutable record behind the read-only TestCaseRecord view
 */
export class CaseRecord implements TestCaseRecord {
  private currentStatus: TestCaseStatus = { state: 'not-run' };
  private currentInterval: TimeInterval;
  driverOutput: string | undefined;

  constructor(
    private readonly id: string,
    readonly outDir: string,
    private readonly clock: Clock | undefined
  ) {
    this.currentInterval = new TimeInterval(clock);
  }

  get status(): TestCaseStatus {
    return this.currentStatus;
  }

  get interval(): TimeInterval {
    return this.currentInterval;
  }

  /**
   * `running` opens a fresh interval, terminal statuses close it
   */
  setStatus(status: TestCaseStatus): void {
    if (status.state === 'not-run') {
      throw ErrorHelpers.statusReset(this.id);
    }
    if (status.state === 'running') {
      this.currentInterval = new TimeInterval(this.clock);
    } else {
      this.currentInterval.stop();
    }
    this.currentStatus = status;
  }
}

const fromDriverOutput = (output: RunTestOutput): TestCaseStatus => {
  switch (output.status.state) {
    case 'passed':
      return { state: 'passed' };
    case 'failed':
      return { state: 'failed' };
    case 'skipped':
      return { state: 'skipped', reason: { kind: 'test-case', message: output.status.message } };
  }
};

export class ExecutionContext implements ExecutionView {
  private readonly records = new Map<string, CaseRecord>();
  private suiteStatus: SuiteStatus = { state: 'not-run' };
  private readonly reporter: Reporter;
  private readonly logger: Logger;

  constructor(
    readonly suite: Suite,
    readonly target: string,
    private readonly options: ExecutionContextOptions
  ) {
    this.reporter = options.reporter ?? createSilentReporter();
    this.logger = (options.logger ?? createSilentLogger()).child({ target });
  }

  get status(): SuiteStatus {
    return this.suiteStatus;
  }

  /**
   * Output directory of this target
   */
  get outDir(): string {
    return join(this.options.outputRoot, this.target);
  }

  /**
   * Create the output directory of every case and reset every case to not-run
   */
  async prepare(): Promise<void> {
    this.records.clear();
    for (const testCase of listTestCases(this.suite)) {
      const outDir = join(this.outDir, testCase.path);
      try {
        await mkdir(outDir, { recursive: true });
      } catch (error) {
        throw BenchrunError.from(error, ErrorCode.E_SYSTEM_FS_ERROR, {
          target: this.target,
          testCaseId: testCaseId(testCase)
        });
      }
      const id = testCaseId(testCase);
      this.records.set(id, new CaseRecord(id, outDir, this.options.clock));
    }
    this.logger.debug({ outDir: this.outDir, testCases: this.records.size }, 'Prepared execution');
  }

  record(testCase: TestCase): TestCaseRecord | undefined {
    return this.records.get(testCaseId(testCase));
  }

  /**
   * Run one visited case and record its outcome. Resolves to true when the
   * case failed or the driver could not run it.
   */
  async run(driver: TestDriver, visit: Visit, signal?: AbortSignal): Promise<boolean> {
    const { testCase, shouldSkip } = visit;
    const record = this.requireRecord(testCase);

    record.setStatus({ state: 'running' });
    this.reporter.reportTestCaseStarted(testCase, this.target, record);

    let status: TestCaseStatus;
    if (shouldSkip.skip && !this.runsDespiteSkip(visit)) {
      status = { state: 'skipped', reason: shouldSkip.reason };
    } else if (this.options.dryRun) {
      status = { state: 'dry-run' };
    } else {
      const id = testCaseId(testCase);
      const result = flatMap(
        await tryCatchAsync(
          () =>
            driver.run({
              suiteDir: this.suite.path,
              config: this.suite.config,
              target: this.target,
              testCase,
              outDir: record.outDir,
              signal
            }),
          (error) =>
            BenchrunError.from(error, ErrorCode.E_DRIVER_RUN_FAILED, {
              target: this.target,
              testCaseId: id
            })
        ),
        (driverResult) => driverResult
      );

      if (signal?.aborted) {
        // Cancelled while in flight: the outcome is unknown, the case stays running
        this.logger.debug({ testCaseId: id }, 'Run cancelled during test case');
        return false;
      }

      if (isOk(result)) {
        status = fromDriverOutput(result.value);
        record.driverOutput = result.value.driverOutput;
      } else {
        this.logger.debug({ testCaseId: id, code: result.error.code }, result.error.message);
        status = { state: 'runner-failed', message: result.error.message };
      }
    }

    record.setStatus(status);
    this.reporter.reportTestCaseResult(testCase, this.target, record);
    return isFailureStatus(status);
  }

  statistics(): Statistics {
    const statistics: Statistics = { passed: 0, failed: 0, runnerFailed: 0, skipped: 0 };
    for (const record of this.records.values()) {
      switch (record.status.state) {
        case 'passed':
          statistics.passed++;
          break;
        case 'failed':
          statistics.failed++;
          break;
        case 'runner-failed':
          statistics.runnerFailed++;
          break;
        case 'skipped':
        case 'dry-run':
          statistics.skipped++;
          break;
        default:
          break;
      }
    }
    return statistics;
  }

  markRunning(): void {
    this.suiteStatus = { state: 'running' };
  }

  markFinished(): void {
    this.suiteStatus = { state: 'finished' };
  }

  markAborted(reason: string): void {
    this.suiteStatus = { state: 'aborted', reason };
    this.logger.debug({ reason }, 'Execution aborted');
  }

  private requireRecord(testCase: TestCase): CaseRecord {
    const id = testCaseId(testCase);
    const record = this.records.get(id);
    if (!record) {
      throw BenchrunError.critical(
        ErrorCode.E_STATE_UNKNOWN_TEST_CASE,
        `test case \`${id}\` was not prepared for target \`${this.target}\``,
        { testCaseId: id, target: this.target }
      );
    }
    return record;
  }

  private runsDespiteSkip(visit: Visit): boolean {
    return (
      this.options.runTeardownOnSkip === true &&
      (visit.phase === 'file-teardown' || visit.phase === 'suite-teardown') &&
      visit.shouldSkip.skip &&
      visit.shouldSkip.reason.kind !== 'test-case'
    );
  }
}
