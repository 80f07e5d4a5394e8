/**
 * Execution entry point
 */

import {
  createSilentLogger,
  type ExecutionStrategy,
  type Logger,
  type Reporter,
  type Suite,
  type TestDriver
} from '@benchrun/core';
import { ExecutionContext } from './execution-context.js';
import { createExecutor } from './strategies.js';

export type ExecuteSuiteOptions = {
  suite: Suite;
  driver: TestDriver;
  targets: readonly string[];
  strategy: ExecutionStrategy;
  /** Cases write below `{outputRoot}/{target}/{file path}/` */
  outputRoot: string;
  reporter?: Reporter;
  logger?: Logger;
  dryRun?: boolean;
  runTeardownOnSkip?: boolean;
  /** Parallel strategy only */
  concurrency?: number;
  signal?: AbortSignal;
};

/**
 * Build, prepare and execute one context per target
 */
export async function executeSuite(options: ExecuteSuiteOptions): Promise<ExecutionContext[]> {
  const { suite, driver, strategy, signal } = options;
  const logger = (options.logger ?? createSilentLogger()).child({ suite: suite.config.name });

  const contexts = options.targets.map(
    (target) =>
      new ExecutionContext(suite, target, {
        outputRoot: options.outputRoot,
        reporter: options.reporter,
        logger,
        dryRun: options.dryRun,
        runTeardownOnSkip: options.runTeardownOnSkip
      })
  );

  for (const context of contexts) {
    await context.prepare();
  }

  logger.debug({ strategy, targets: options.targets, driver: driver.name }, 'Executing suite');
  await createExecutor(strategy, { concurrency: options.concurrency }).execute(
    driver,
    suite,
    contexts,
    { signal }
  );

  return contexts;
}
