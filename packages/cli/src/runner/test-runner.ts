/**
 * Test runner - drives one invocation of the CLI
 *
 * Loads every requested suite, then lists or executes the ones that loaded.
 * A suite that fails to load is reported and counted; the others still run.
 */

import { mkdir, stat } from 'node:fs/promises';
import { resolve } from 'node:path';
import {
  BenchrunError,
  createSilentLogger,
  ErrorCode,
  type ExecutionView,
  isErr,
  type Logger,
  type Reporter,
  type RunSettings,
  type Suite,
  withDuration
} from '@benchrun/core';
import {
  createDefaultDriverRegistry,
  type DriverRegistry,
  executeSuite,
  SuiteRegistry
} from '@benchrun/runtime';

export type TestRunnerOptions = {
  settings: RunSettings;
  reporter: Reporter;
  logger?: Logger;
  drivers?: DriverRegistry;
  signal?: AbortSignal;
};

export type SuiteExecution = {
  suite: Suite;
  contexts: ExecutionView[];
};

export type RunSummary = {
  loadFailures: number;
  executions: SuiteExecution[];
  durationMs: number;
};

export type ListOptions = {
  targets: boolean;
  tests: boolean;
};

export class TestRunner {
  private readonly settings: RunSettings;
  private readonly reporter: Reporter;
  private readonly logger: Logger;
  private readonly suites: SuiteRegistry;

  constructor(private readonly options: TestRunnerOptions) {
    this.settings = options.settings;
    this.reporter = options.reporter;
    this.logger = options.logger ?? createSilentLogger();
    const drivers = options.drivers ?? createDefaultDriverRegistry({ logger: this.logger });
    this.suites = new SuiteRegistry(drivers, this.logger);
  }

  /**
   * Load every suite, reporting each failure. Returns the number of failures.
   */
  async loadSuites(): Promise<number> {
    let failures = 0;
    for (const suiteDir of this.settings.suiteDirs) {
      const loaded = await this.suites.loadSuite(suiteDir);
      if (isErr(loaded)) {
        failures++;
        this.reporter.error(`failed to load test suite \`${suiteDir}\``, loaded.error.message);
        this.logger.debug({ suiteDir, code: loaded.error.code }, 'Suite load failed');
      }
    }
    return failures;
  }

  async list(options: ListOptions): Promise<number> {
    const failures = await this.loadSuites();
    for (const { suite } of this.suites.list()) {
      if (options.targets) {
        this.reporter.reportTargetList(suite);
      }
      if (options.tests) {
        this.reporter.reportTestList(suite);
      }
    }
    return failures;
  }

  async run(): Promise<RunSummary> {
    const startTime = Date.now();
    const loadFailures = await this.loadSuites();
    const executions: SuiteExecution[] = [];

    if (this.suites.list().length > 0) {
      await this.prepareOutputDir();
    }

    for (const { suite, driver } of this.suites.list()) {
      if (this.options.signal?.aborted) {
        this.reporter.warning(`skipping test suite \`${suite.path}\`: run cancelled`);
        continue;
      }

      const targets = this.selectTargets(suite.path, suite.config.targets);
      this.logger.debug({ suite: suite.config.name, targets }, 'Selected targets');

      const contexts = await withDuration(this.logger, `test suite ${suite.config.name}`, () =>
        executeSuite({
          suite,
          driver,
          targets,
          strategy: this.settings.strategy,
          outputRoot: resolve(this.settings.outDir),
          reporter: this.reporter,
          logger: this.logger,
          dryRun: this.settings.dryRun,
          runTeardownOnSkip: this.settings.alwaysTeardown,
          concurrency: this.settings.concurrency,
          signal: this.options.signal
        })
      );

      this.reporter.reportExecutionSummary(suite, contexts);
      executions.push({ suite, contexts });
    }

    const durationMs = Date.now() - startTime;
    this.reporter.reportTotalTime(durationMs);
    return { loadFailures, executions, durationMs };
  }

  /**
   * Requested targets, or every target the suite declares. Targets the suite
   * does not declare are warned about and still run.
   */
  selectTargets(suitePath: string, declared: readonly string[]): string[] {
    if (this.settings.targets.length === 0) {
      return [...declared];
    }
    for (const target of this.settings.targets) {
      if (!declared.includes(target)) {
        this.reporter.warning(
          `target \`${target}\` is not declared by test suite \`${suitePath}\``
        );
      }
    }
    return [...this.settings.targets];
  }

  private async prepareOutputDir(): Promise<void> {
    const outDir = resolve(this.settings.outDir);
    const existing = await stat(outDir).catch((error: unknown) => {
      if (isNotFound(error)) {
        return undefined;
      }
      throw BenchrunError.from(error, ErrorCode.E_SYSTEM_FS_ERROR, { outDir });
    });

    if (existing) {
      this.reporter.warning(`output directory \`${outDir}\` already exists`);
      return;
    }

    try {
      await mkdir(outDir, { recursive: true });
    } catch (error) {
      throw BenchrunError.from(error, ErrorCode.E_SYSTEM_FS_ERROR, { outDir });
    }
    this.reporter.info(`created output directory \`${outDir}\``);
  }
}

const isNotFound = (error: unknown): boolean =>
  error instanceof Error && 'code' in error && error.code === 'ENOENT';

/**
 * Whether the run should exit with a failure code
 */
export function hasFailures(summary: RunSummary): boolean {
  if (summary.loadFailures > 0) {
    return true;
  }
  return summary.executions.some(({ contexts }) =>
    contexts.some((context) => {
      const { failed, runnerFailed } = context.statistics();
      return failed + runnerFailed > 0;
    })
  );
}
