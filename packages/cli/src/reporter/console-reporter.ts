/**
 * Human-friendly console reporter
 *
 * Prints one line per test case result, per-target summaries (or a matrix)
 * and leveled messages to stdout. Logs stay on stderr.
 */

import {
  BenchrunError,
  describeSkipReason,
  type ExecutionView,
  formatDuration,
  type Reporter,
  type Statistics,
  type Suite,
  type SuiteStatus,
  type TestCase,
  type TestCaseRecord,
  testCaseId
} from '@benchrun/core';
import { listTestCases } from '@benchrun/runtime';
import chalk, { Chalk, type ChalkInstance } from 'chalk';
import { renderMatrix } from './matrix.js';

export type ConsoleReporterOptions = {
  debug?: boolean;
  matrixSummary?: boolean;
  /** Defaults to what the terminal supports */
  color?: boolean;
  write?: (line: string) => void;
};

export class ConsoleReporter implements Reporter {
  private readonly chalk: ChalkInstance;
  private readonly write: (line: string) => void;

  constructor(private readonly options: ConsoleReporterOptions = {}) {
    this.chalk = new Chalk({ level: options.color === false ? 0 : chalk.level });
    this.write = options.write ?? ((line) => console.log(line));
  }

  notice(message: string, details?: string): void {
    this.printWithDetails('', message, details);
  }

  info(message: string, details?: string): void {
    this.printWithDetails(this.chalk.cyan('Info: '), message, details);
  }

  warning(message: string, details?: string): void {
    this.printWithDetails(this.chalk.yellow('Warning: '), message, details);
  }

  error(message: string, details?: string): void {
    this.printWithDetails(this.chalk.red('Error: '), message, details);
  }

  errorFrom(error: unknown): void {
    if (error instanceof BenchrunError) {
      this.error(error.message, error.details);
    } else if (error instanceof Error) {
      this.error(error.message);
    } else {
      this.error(String(error));
    }
  }

  reportTargetList(suite: Suite): void {
    this.write(this.chalk.whiteBright(`Targets supported by test suite \`${suite.path}\``));
    for (const target of suite.config.targets) {
      this.write(`  ${target}`);
    }
    this.write('');
  }

  reportTestList(suite: Suite): void {
    this.write(this.chalk.whiteBright(`Tests defined in test suite \`${suite.path}\``));
    for (const testCase of listTestCases(suite)) {
      this.write(`  ${testCaseId(testCase)}`);
    }
    this.write('');
  }

  reportTestCaseStarted(testCase: TestCase, target: string): void {
    if (this.options.debug) {
      this.write(
        this.chalk.dim(`Started test case \`${testCaseId(testCase)}\` for target \`${target}\``)
      );
    }
  }

  reportTestCaseResult(testCase: TestCase, target: string, record: TestCaseRecord): void {
    this.write(
      `Running test case \`${testCaseId(testCase)}\` for target \`${target}\` ${this.describeOutcome(record)}`
    );
    if (record.status.state === 'runner-failed') {
      this.write(`  ${record.status.message}`);
    }
    if (this.options.debug && record.driverOutput) {
      this.write(this.chalk.dim(`  output: ${record.driverOutput}`));
    }
  }

  reportExecutionSummary(suite: Suite, executions: readonly ExecutionView[]): void {
    const heading = this.chalk.whiteBright(`Test suite \`${suite.path}\` execution summary`);

    if (this.options.matrixSummary) {
      this.write('');
      this.write(heading);
      this.write(renderMatrix(suite, executions, this.chalk));
      for (const execution of executions) {
        this.write(`  ${execution.target}: ${this.formatStatistics(execution.statistics())}`);
      }
      return;
    }

    for (const execution of executions) {
      this.write('');
      this.write(heading);
      this.write(`  Target: ${execution.target}`);
      this.write(`  Status: ${formatSuiteStatus(execution.status)}`);
      this.write(`  Statistics: ${this.formatStatistics(execution.statistics())}`);
    }
  }

  reportTotalTime(durationMs: number): void {
    this.write('');
    this.write(this.chalk.whiteBright(`Total time: ${formatDuration(durationMs)}`));
  }

  private printWithDetails(prefix: string, message: string, details?: string): void {
    this.write(`${prefix}${this.chalk.whiteBright(message)}`);
    if (details) {
      this.write(`  ${details}`);
    }
  }

  private describeOutcome(record: TestCaseRecord): string {
    const { status } = record;
    switch (status.state) {
      case 'passed':
        return this.chalk.green('PASSED');
      case 'failed':
        return this.chalk.red('FAILED');
      case 'runner-failed':
        return this.chalk.red('RUNNER_FAILED');
      case 'skipped':
        return `${this.chalk.dim('SKIPPED')} (reason: ${describeSkipReason(status.reason)})`;
      case 'dry-run':
        return this.chalk.dim('DRYRUN');
      case 'running':
        return this.chalk.dim('RUNNING');
      case 'not-run':
        return this.chalk.dim('NOTRUN');
    }
  }

  private formatStatistics(statistics: Statistics): string {
    return [
      `${this.chalk.green(statistics.passed)} passed`,
      `${this.chalk.red(statistics.failed)} failed`,
      `${this.chalk.red(statistics.runnerFailed)} runner failed`,
      `${this.chalk.dim(statistics.skipped)} skipped`
    ].join(', ');
  }
}

export function formatSuiteStatus(status: SuiteStatus): string {
  return status.state === 'aborted' ? `aborted (${status.reason})` : status.state;
}
