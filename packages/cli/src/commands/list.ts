/**
 * List command - Show the tests or targets of test suites
 */

import { createLogger, getLogLevel, parseRunSettings } from '@benchrun/core';
import type { Command } from 'commander';
import { ConsoleReporter } from '../reporter/console-reporter.js';
import { TestRunner } from '../runner/test-runner.js';

interface ListCommandOptions {
  targets?: boolean;
  color: boolean;
}

export function setupListCommand(program: Command): void {
  program
    .command('list <suites...>')
    .description('List the tests of test suites')
    .option('--targets', 'list targets instead of tests')
    .option('--no-color', 'disable colored output')
    .action(async (suites: string[], options: ListCommandOptions, command: Command) => {
      const globals = command.optsWithGlobals<{ verbose?: boolean; quiet?: boolean }>();
      const runner = new TestRunner({
        settings: parseRunSettings({ suiteDirs: suites }),
        reporter: new ConsoleReporter({ color: options.color }),
        logger: createLogger({ level: getLogLevel(globals) })
      });

      const failures = await runner.list({
        targets: options.targets ?? false,
        tests: !options.targets
      });
      if (failures > 0) {
        process.exitCode = 1;
      }
    });
}
