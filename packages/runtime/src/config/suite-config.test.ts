import { join } from 'node:path';
import { ErrorCode, isErr, isOk } from '@benchrun/core';
import { cleanupTempDir, createTempDir, writeFiles } from '@benchrun/test-utils';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { loadSuiteConfig, parseSuiteConfig } from './suite-config.js';

describe('parseSuiteConfig', () => {
  it('should accept comments and trailing commas', () => {
    const result = parseSuiteConfig(
      `{
        // smoke tests for lab boards
        "name": "smoke",
        "driver": "bash",
        "test-file-patterns": ["*.sh"],
        "global-fixture": "global.sh",
        "targets": ["board-a", "board-b"],
      }`,
      'test-suite.json'
    );

    expect(result).toEqual({
      ok: true,
      value: {
        name: 'smoke',
        description: '',
        version: undefined,
        driver: 'bash',
        testFilePatterns: ['*.sh'],
        globalFixture: 'global.sh',
        targets: ['board-a', 'board-b']
      }
    });
  });

  it('should report syntax errors', () => {
    const result = parseSuiteConfig('{ "name": }', 'test-suite.json');

    expect(isErr(result) && result.error.code).toBe(ErrorCode.E_CONFIG_PARSE_ERROR);
    expect(isErr(result) && result.error.message).toBe(
      'cannot parse `test-suite.json`: ValueExpected at offset 10'
    );
  });

  it('should report schema violations', () => {
    const result = parseSuiteConfig('{ "name": "smoke", "targets": "board-a" }', 'test-suite.json');

    expect(isErr(result) && result.error.code).toBe(ErrorCode.E_CONFIG_VALIDATION_FAILED);
    expect(isErr(result) && result.error.message).toBe(
      'Configuration validation failed:\ndriver: Required\ntargets: Expected array, received string'
    );
  });
});

describe('loadSuiteConfig', () => {
  let suiteDir: string;

  beforeEach(async () => {
    suiteDir = await createTempDir();
  });

  afterEach(async () => {
    await cleanupTempDir(suiteDir);
  });

  it('should load test-suite.json from the suite directory', async () => {
    await writeFiles(suiteDir, {
      'test-suite.json': '{ "name": "smoke", "driver": "shell", "version": "1.2.0" }'
    });

    const result = await loadSuiteConfig(suiteDir);

    expect(isOk(result) && result.value.version).toBe('1.2.0');
  });

  it('should tell a missing configuration apart', async () => {
    const result = await loadSuiteConfig(suiteDir);

    expect(isErr(result) && result.error.code).toBe(ErrorCode.E_CONFIG_NOT_FOUND);
    expect(isErr(result) && result.error.context.configPath).toBe(
      join(suiteDir, 'test-suite.json')
    );
  });

  it('should report unreadable configurations', async () => {
    await writeFiles(suiteDir, { 'test-suite.json/placeholder': '' });

    const result = await loadSuiteConfig(suiteDir);

    expect(isErr(result) && result.error.code).toBe(ErrorCode.E_CONFIG_READ_FAILED);
  });
});
