/**
 * Execution strategies
 *
 * A strategy drives one traversal per execution context to completion.
 * Sequential and round-robin step through awaited driver calls on one logical
 * thread; parallel overlaps one worker per target.
 */

import type { ExecutionStrategy, Suite, TestDriver } from '@benchrun/core';
import pLimit from 'p-limit';
import { Traversal, type Visitor } from '../traversal/traversal.js';
import type { ExecutionContext } from './execution-context.js';

export const CANCELLED_REASON = 'cancelled';

export type ExecuteOptions = {
  /** Checked between cases; an aborted signal stops every remaining traversal */
  signal?: AbortSignal;
};

export type Executor = {
  readonly strategy: ExecutionStrategy;
  execute(
    driver: TestDriver,
    suite: Suite,
    contexts: readonly ExecutionContext[],
    options?: ExecuteOptions
  ): Promise<void>;
};

const visitorFor =
  (context: ExecutionContext, driver: TestDriver, signal?: AbortSignal): Visitor =>
  (visit) =>
    context.run(driver, visit, signal);

const cancel = (traversal: Traversal, context: ExecutionContext): void => {
  traversal.abort();
  context.markAborted(CANCELLED_REASON);
};

/**
 * Drive a fresh traversal of one context to completion
 */
async function runToCompletion(
  driver: TestDriver,
  suite: Suite,
  context: ExecutionContext,
  signal?: AbortSignal
): Promise<void> {
  const traversal = new Traversal(suite);
  const visitor = visitorFor(context, driver, signal);
  context.markRunning();

  for (;;) {
    if (signal?.aborted) {
      cancel(traversal, context);
      return;
    }
    if (await traversal.step(visitor)) {
      break;
    }
  }
  context.markFinished();
}

/**
 * One context after another
 */
export class SequentialExecutor implements Executor {
  readonly strategy = 'sequential';

  async execute(
    driver: TestDriver,
    suite: Suite,
    contexts: readonly ExecutionContext[],
    options: ExecuteOptions = {}
  ): Promise<void> {
    for (const context of contexts) {
      await runToCompletion(driver, suite, context, options.signal);
    }
  }
}

/**
 * One case per target per round, in target order
 */
export class RoundRobinExecutor implements Executor {
  readonly strategy = 'round-robin';

  async execute(
    driver: TestDriver,
    suite: Suite,
    contexts: readonly ExecutionContext[],
    options: ExecuteOptions = {}
  ): Promise<void> {
    const { signal } = options;
    const queue = contexts.map((context) => ({
      context,
      traversal: new Traversal(suite),
      visitor: visitorFor(context, driver, signal)
    }));
    for (const { context } of queue) {
      context.markRunning();
    }

    let entry = queue.shift();
    while (entry) {
      if (signal?.aborted) {
        for (const pending of [entry, ...queue]) {
          cancel(pending.traversal, pending.context);
        }
        return;
      }

      if (await entry.traversal.step(entry.visitor)) {
        entry.context.markFinished();
      } else {
        queue.push(entry);
      }
      entry = queue.shift();
    }
  }
}

/**
 * Every target's traversal as its own worker, joined before returning
 */
export class ParallelExecutor implements Executor {
  readonly strategy = 'parallel';

  /**
   * @param concurrency Maximum number of workers at once, one per target by default
   */
  constructor(private readonly concurrency?: number) {}

  async execute(
    driver: TestDriver,
    suite: Suite,
    contexts: readonly ExecutionContext[],
    options: ExecuteOptions = {}
  ): Promise<void> {
    const limit = pLimit(this.concurrency ?? Math.max(contexts.length, 1));
    await Promise.all(
      contexts.map((context) =>
        limit(() => runToCompletion(driver, suite, context, options.signal))
      )
    );
  }
}

export type ExecutorOptions = {
  concurrency?: number;
};

export function createExecutor(
  strategy: ExecutionStrategy,
  options: ExecutorOptions = {}
): Executor {
  switch (strategy) {
    case 'sequential':
      return new SequentialExecutor();
    case 'round-robin':
      return new RoundRobinExecutor();
    case 'parallel':
      return new ParallelExecutor(options.concurrency);
  }
}
