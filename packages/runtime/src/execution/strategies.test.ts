/**
 * Tests for the execution strategies
 */

import type { Suite } from '@benchrun/core';
import {
  buildSuite,
  cleanupTempDir,
  createFakeDriver,
  createTempDir,
  type FakeDriver
} from '@benchrun/test-utils';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { listTestCases } from '../traversal/traversal.js';
import { ExecutionContext } from './execution-context.js';
import {
  CANCELLED_REASON,
  createExecutor,
  ParallelExecutor,
  RoundRobinExecutor,
  SequentialExecutor
} from './strategies.js';

const twoCaseSuite = buildSuite({ files: [{ path: 'a.sh', cases: ['x', 'y'] }] });

const largeSuite = buildSuite({
  setup: true,
  teardown: true,
  files: [
    { path: 'a.sh', setup: true, teardown: true, cases: ['test_1', 'test_2', 'test_3'] },
    { path: 'b.sh', cases: ['test_4'] },
    { path: 'c.sh', setup: true, cases: ['test_5', 'test_6'] }
  ]
});

const callOrder = (driver: FakeDriver): string[] =>
  driver.calls.map((call) => `${call.target}.${call.testCaseId.split('::')[1]}`);

describe('Execution strategies', () => {
  let outputRoot: string;

  beforeEach(async () => {
    outputRoot = await createTempDir();
  });

  afterEach(async () => {
    await cleanupTempDir(outputRoot);
  });

  const prepareContexts = async (suite: Suite, targets: string[]): Promise<ExecutionContext[]> => {
    const contexts = targets.map((target) => new ExecutionContext(suite, target, { outputRoot }));
    for (const context of contexts) {
      await context.prepare();
    }
    return contexts;
  };

  describe('ordering', () => {
    it('should run one target after another sequentially', async () => {
      const driver = createFakeDriver();
      const contexts = await prepareContexts(twoCaseSuite, ['T1', 'T2']);

      await new SequentialExecutor().execute(driver, twoCaseSuite, contexts);

      expect(callOrder(driver)).toEqual(['T1.x', 'T1.y', 'T2.x', 'T2.y']);
    });

    it('should interleave targets in round-robin', async () => {
      const driver = createFakeDriver();
      const contexts = await prepareContexts(twoCaseSuite, ['T1', 'T2']);

      await new RoundRobinExecutor().execute(driver, twoCaseSuite, contexts);

      expect(callOrder(driver)).toEqual(['T1.x', 'T2.x', 'T1.y', 'T2.y']);
    });

    it('should keep the per-target order of sequential in round-robin', async () => {
      const sequential = createFakeDriver();
      const roundRobin = createFakeDriver();

      await new SequentialExecutor().execute(
        sequential,
        largeSuite,
        await prepareContexts(largeSuite, ['T1', 'T2'])
      );
      await new RoundRobinExecutor().execute(
        roundRobin,
        largeSuite,
        await prepareContexts(largeSuite, ['T1', 'T2'])
      );

      const ofTarget = (driver: FakeDriver, target: string) =>
        driver.calls.filter((call) => call.target === target).map((call) => call.testCaseId);

      expect(ofTarget(roundRobin, 'T1')).toEqual(ofTarget(sequential, 'T1'));
      expect(ofTarget(roundRobin, 'T2')).toEqual(ofTarget(sequential, 'T2'));
    });
  });

  describe('round-robin fairness', () => {
    it('should run N x M cases without letting a target fall behind', async () => {
      const targets = ['T1', 'T2', 'T3'];
      const counts = new Map(targets.map((target) => [target, 0]));
      let maxSpread = 0;
      const driver = createFakeDriver({
        onRun: (request) => {
          counts.set(request.target, (counts.get(request.target) ?? 0) + 1);
          const values = Array.from(counts.values());
          maxSpread = Math.max(maxSpread, Math.max(...values) - Math.min(...values));
        }
      });
      const contexts = await prepareContexts(largeSuite, targets);

      await new RoundRobinExecutor().execute(driver, largeSuite, contexts);

      const caseCount = listTestCases(largeSuite).length;
      expect(caseCount).toBe(11);
      expect(driver.calls).toHaveLength(targets.length * caseCount);
      expect(maxSpread).toBeLessThanOrEqual(1);
      expect(contexts.map((context) => context.status)).toEqual([
        { state: 'finished' },
        { state: 'finished' },
        { state: 'finished' }
      ]);
    });
  });

  describe('parallel', () => {
    it('should run every target concurrently and join them', async () => {
      const driver = createFakeDriver({ delayMs: 5 });
      const contexts = await prepareContexts(twoCaseSuite, ['T1', 'T2', 'T3']);

      await new ParallelExecutor().execute(driver, twoCaseSuite, contexts);

      expect(driver.calls).toHaveLength(6);
      expect(
        driver.calls
          .slice(0, 3)
          .map((call) => call.target)
          .sort()
      ).toEqual(['T1', 'T2', 'T3']);
      expect(contexts.map((context) => context.statistics().passed)).toEqual([2, 2, 2]);
      expect(contexts.every((context) => context.status.state === 'finished')).toBe(true);
    });

    it('should respect a concurrency limit', async () => {
      const driver = createFakeDriver({ delayMs: 1 });
      const contexts = await prepareContexts(twoCaseSuite, ['T1', 'T2']);

      await new ParallelExecutor(1).execute(driver, twoCaseSuite, contexts);

      expect(callOrder(driver)).toEqual(['T1.x', 'T1.y', 'T2.x', 'T2.y']);
    });
  });

  describe('failure handling', () => {
    it.each(['sequential', 'round-robin', 'parallel'] as const)(
      'should keep failures of one target away from others (%s)',
      async (strategy) => {
        const driver = createFakeDriver({
          outcomes: {
            'T1/fixture.sh::setup': 'failed',
            'T2/a.sh::test_1': 'runner-error',
            'T2/a.sh::test_2': 'failed'
          }
        });
        const contexts = await prepareContexts(largeSuite, ['T1', 'T2', 'T3']);

        await createExecutor(strategy).execute(driver, largeSuite, contexts);

        expect(contexts.map((context) => context.statistics())).toEqual([
          { passed: 0, failed: 1, runnerFailed: 0, skipped: 10 },
          { passed: 9, failed: 1, runnerFailed: 1, skipped: 0 },
          { passed: 11, failed: 0, runnerFailed: 0, skipped: 0 }
        ]);
        expect(driver.calls.filter((call) => call.target === 'T1')).toHaveLength(1);
      }
    );
  });

  describe('cancellation', () => {
    it('should stop round-robin between cases and abort every context', async () => {
      const controller = new AbortController();
      let runs = 0;
      const driver = createFakeDriver({
        onRun: () => {
          runs++;
          if (runs === 2) {
            controller.abort();
          }
        }
      });
      const contexts = await prepareContexts(twoCaseSuite, ['T1', 'T2']);
      const [x, y] = listTestCases(twoCaseSuite);

      await new RoundRobinExecutor().execute(driver, twoCaseSuite, contexts, {
        signal: controller.signal
      });

      expect(callOrder(driver)).toEqual(['T1.x', 'T2.x']);
      expect(contexts.map((context) => context.status)).toEqual([
        { state: 'aborted', reason: CANCELLED_REASON },
        { state: 'aborted', reason: CANCELLED_REASON }
      ]);
      const [first, second] = contexts;
      expect(first?.record(x)?.status).toEqual({ state: 'passed' });
      expect(second?.record(x)?.status).toEqual({ state: 'running' });
      expect(first?.record(y)?.status).toEqual({ state: 'not-run' });
    });

    it.each(['sequential', 'parallel'] as const)(
      'should run nothing once the signal is aborted (%s)',
      async (strategy) => {
        const driver = createFakeDriver();
        const contexts = await prepareContexts(twoCaseSuite, ['T1', 'T2']);

        await createExecutor(strategy).execute(driver, twoCaseSuite, contexts, {
          signal: AbortSignal.abort()
        });

        expect(driver.calls).toEqual([]);
        expect(contexts.map((context) => context.status.state)).toEqual(['aborted', 'aborted']);
      }
    );
  });

  describe('createExecutor', () => {
    it('should build the executor of each strategy', () => {
      expect(createExecutor('sequential')).toBeInstanceOf(SequentialExecutor);
      expect(createExecutor('round-robin')).toBeInstanceOf(RoundRobinExecutor);
      expect(createExecutor('parallel', { concurrency: 2 })).toBeInstanceOf(ParallelExecutor);
      expect(createExecutor('parallel').strategy).toBe('parallel');
    });
  });
});
