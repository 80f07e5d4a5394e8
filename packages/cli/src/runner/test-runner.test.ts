/**
 * Tests for the test runner
 */

import { mkdir } from 'node:fs/promises';
import { join } from 'node:path';
import { createSilentLogger, type Logger, parseRunSettings, type RunSettingsInput } from '@benchrun/core';
import { DriverRegistry } from '@benchrun/runtime';
import {
  buildSuite,
  cleanupTempDir,
  createFakeDriver,
  createTempDir,
  type FakeOutcome,
  RecordingReporter,
  writeFiles
} from '@benchrun/test-utils';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { hasFailures, TestRunner } from './test-runner.js';

const SUITE_CONFIG = '{ "name": "smoke", "driver": "fake", "targets": ["T1", "T2"] }';

describe('TestRunner', () => {
  let root: string;
  let suiteDir: string;
  let outDir: string;
  let reporter: RecordingReporter;

  beforeEach(async () => {
    root = await createTempDir();
    suiteDir = join(root, 'suite');
    outDir = join(root, 'out');
    reporter = new RecordingReporter();
    await writeFiles(suiteDir, { 'test-suite.json': SUITE_CONFIG });
  });

  afterEach(async () => {
    await cleanupTempDir(root);
  });

  const createRunner = (
    settings: Partial<RunSettingsInput> = {},
    options: { outcomes?: Record<string, FakeOutcome>; signal?: AbortSignal; logger?: Logger } = {}
  ) => {
    const suite = buildSuite({
      name: 'smoke',
      path: suiteDir,
      targets: ['T1', 'T2'],
      files: [{ path: 'a.sh', cases: ['test_x', 'test_y'] }]
    });
    const drivers = new DriverRegistry();
    drivers.register(createFakeDriver({ suite, outcomes: options.outcomes }));

    return new TestRunner({
      settings: parseRunSettings({ suiteDirs: [suiteDir], outDir, ...settings }),
      reporter,
      drivers,
      signal: options.signal,
      logger: options.logger
    });
  };

  describe('run', () => {
    it('should run every declared target and report the summary', async () => {
      const summary = await createRunner().run();

      expect(reporter.messages()).toEqual([`created output directory \`${outDir}\``]);
      expect(reporter.results()).toEqual([
        'T1/a.sh::test_x',
        'T2/a.sh::test_x',
        'T1/a.sh::test_y',
        'T2/a.sh::test_y'
      ]);
      expect(reporter.events.slice(-2)).toEqual([
        { type: 'summary', suite: 'smoke', targets: ['T1', 'T2'] },
        { type: 'total-time', durationMs: summary.durationMs }
      ]);
      expect(summary.loadFailures).toBe(0);
      expect(hasFailures(summary)).toBe(false);
    });

    it('should log how long each suite took', async () => {
      const logger = createSilentLogger();
      const infoSpy = vi.spyOn(logger, 'info');

      await createRunner({}, { logger }).run();

      expect(infoSpy).toHaveBeenCalledWith(
        { duration_ms: expect.any(Number), operation: 'test suite smoke' },
        expect.stringMatching(/^Completed test suite smoke in \d+ms$/)
      );
    });

    it('should follow the requested strategy', async () => {
      await createRunner({ strategy: 'sequential' }).run();

      expect(reporter.results()).toEqual([
        'T1/a.sh::test_x',
        'T1/a.sh::test_y',
        'T2/a.sh::test_x',
        'T2/a.sh::test_y'
      ]);
    });

    it('should warn when the output directory exists', async () => {
      await mkdir(outDir);

      await createRunner().run();

      expect(reporter.messages('warning')).toEqual([
        `output directory \`${outDir}\` already exists`
      ]);
      expect(reporter.messages('info')).toEqual([]);
    });

    it('should run requested targets and warn about undeclared ones', async () => {
      await createRunner({ targets: ['T2', 'T3'] }).run();

      expect(reporter.messages('warning')).toEqual([
        `target \`T3\` is not declared by test suite \`${suiteDir}\``
      ]);
      expect(reporter.results()).toEqual([
        'T2/a.sh::test_x',
        'T3/a.sh::test_x',
        'T2/a.sh::test_y',
        'T3/a.sh::test_y'
      ]);
    });

    it('should report suites that fail to load and run the others', async () => {
      const missing = join(root, 'missing');

      const summary = await createRunner({ suiteDirs: [missing, suiteDir] }).run();

      expect(reporter.events[0]).toEqual({
        type: 'message',
        level: 'error',
        message: `failed to load test suite \`${missing}\``,
        details: `no test-suite.json found in \`${missing}\``
      });
      expect(summary.loadFailures).toBe(1);
      expect(summary.executions).toHaveLength(1);
      expect(hasFailures(summary)).toBe(true);
    });

    it('should flag failing test cases', async () => {
      const summary = await createRunner({}, { outcomes: { 'T2/a.sh::test_y': 'failed' } }).run();

      expect(hasFailures(summary)).toBe(true);
      expect(summary.executions[0]?.contexts.map((context) => context.statistics().failed)).toEqual(
        [0, 1]
      );
    });

    it('should skip suites once the run is cancelled', async () => {
      const controller = new AbortController();
      controller.abort();

      const summary = await createRunner({}, { signal: controller.signal }).run();

      expect(reporter.messages('warning')).toEqual([
        `skipping test suite \`${suiteDir}\`: run cancelled`
      ]);
      expect(summary.executions).toEqual([]);
      expect(reporter.results()).toEqual([]);
    });
  });

  describe('list', () => {
    it('should list targets and tests of every loaded suite', async () => {
      const failures = await createRunner().list({ targets: true, tests: true });

      expect(failures).toBe(0);
      expect(reporter.events).toEqual([
        { type: 'target-list', suite: 'smoke' },
        { type: 'test-list', suite: 'smoke' }
      ]);
    });

    it('should count suites that fail to load', async () => {
      const failures = await createRunner({ suiteDirs: [join(root, 'missing')] }).list({
        targets: false,
        tests: true
      });

      expect(failures).toBe(1);
      expect(reporter.messages('error')).toHaveLength(1);
    });
  });
});
