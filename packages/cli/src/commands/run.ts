/**
 * Run command - Execute test suites against their targets
 */

import {
  createLogger,
  DEFAULT_OUT_DIR,
  EXECUTION_STRATEGIES,
  formatConfigError,
  getLogLevel,
  LOG_LEVELS,
  type Logger,
  logError,
  parseRunSettings,
  type RunSettings
} from '@benchrun/core';
import { type Command, Option } from 'commander';
import { ZodError } from 'zod';
import { ConsoleReporter } from '../reporter/console-reporter.js';
import { hasFailures, TestRunner } from '../runner/test-runner.js';

export interface RunOptions {
  outDir: string;
  target: string[];
  execStrategy: string;
  dryRun?: boolean;
  debug?: boolean;
  matrixSummary?: boolean;
  jobs?: string;
  alwaysTeardown?: boolean;
  listTests?: boolean;
  listTargets?: boolean;
  logLevel?: string;
  logFormat?: string;
  color: boolean;
}

type GlobalOptions = {
  verbose?: boolean;
  quiet?: boolean;
};

const collect = (value: string, previous: string[]): string[] => [...previous, value];

/**
 * Map command line options to validated run settings, throws ZodError
 */
export function toRunSettings(suiteDirs: string[], options: RunOptions): RunSettings {
  return parseRunSettings({
    suiteDirs,
    outDir: options.outDir,
    targets: options.target,
    strategy: options.execStrategy,
    dryRun: options.dryRun ?? false,
    debug: options.debug ?? false,
    matrixSummary: options.matrixSummary ?? false,
    concurrency: options.jobs === undefined ? undefined : Number(options.jobs),
    alwaysTeardown: options.alwaysTeardown ?? false
  });
}

export function createCommandLogger(options: RunOptions, globals: GlobalOptions): Logger {
  return createLogger({
    level: getLogLevel({
      verbose: globals.verbose,
      quiet: globals.quiet,
      logLevel: options.logLevel
    }),
    format: options.logFormat === 'pretty' ? 'pretty' : 'json'
  });
}

export function setupRunCommand(program: Command): void {
  program
    .command('run <suites...>')
    .description('Run test suites against their targets')
    .option('-o, --out-dir <dir>', 'output directory for logs and data', DEFAULT_OUT_DIR)
    .option('-t, --target <name>', 'target to run on (repeatable)', collect, [])
    .addOption(
      new Option('-s, --exec-strategy <strategy>', 'how targets are interleaved')
        .choices(EXECUTION_STRATEGIES)
        .default('round-robin')
    )
    .option('-n, --dry-run', 'go through all tests without executing them')
    .option('-d, --debug', 'print additional diagnostics')
    .option('-m, --matrix-summary', 'summarize as a test case x target matrix')
    .option('-j, --jobs <count>', 'maximum number of targets run at once (parallel)')
    .option('--always-teardown', 'run teardown even when a setup failed')
    .option('-l, --list-tests', 'list the tests of each suite and exit')
    .option('-L, --list-targets', 'list the targets of each suite and exit')
    .addOption(new Option('--log-level <level>', 'log level').choices(LOG_LEVELS))
    .addOption(
      new Option('--log-format <format>', 'log format').choices(['json', 'pretty']).default('json')
    )
    .option('--no-color', 'disable colored output')
    .action(async (suites: string[], options: RunOptions, command: Command) => {
      let settings: RunSettings;
      try {
        settings = toRunSettings(suites, options);
      } catch (error) {
        if (error instanceof ZodError) {
          console.error(formatConfigError(error));
        } else {
          console.error('Invalid options:', error);
        }
        process.exit(1);
      }

      const logger = createCommandLogger(options, command.optsWithGlobals<GlobalOptions>());
      const reporter = new ConsoleReporter({
        debug: settings.debug,
        matrixSummary: settings.matrixSummary,
        color: options.color
      });

      if (options.listTests || options.listTargets) {
        const runner = new TestRunner({ settings, reporter, logger });
        const failures = await runner.list({
          tests: options.listTests ?? false,
          targets: options.listTargets ?? false
        });
        if (failures > 0) {
          process.exitCode = 1;
        }
        return;
      }

      const controller = new AbortController();
      const onInterrupt = (): void => {
        reporter.warning('interrupted, cancelling the run');
        controller.abort();
      };
      process.once('SIGINT', onInterrupt);

      try {
        const runner = new TestRunner({ settings, reporter, logger, signal: controller.signal });
        const summary = await runner.run();
        if (hasFailures(summary)) {
          process.exitCode = 1;
        }
      } catch (error) {
        logError(logger, error, 'Run failed');
        reporter.errorFrom(error);
        process.exit(1);
      } finally {
        process.off('SIGINT', onInterrupt);
      }
    });
}
