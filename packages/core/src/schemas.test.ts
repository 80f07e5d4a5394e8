/**
 * Tests for configuration schemas
 */

import { describe, expect, it } from 'vitest';
import {
  formatConfigError,
  parseRunSettings,
  RunSettingsSchema,
  safeParseSuiteConfig
} from './schemas.js';

describe('SuiteConfigSchema', () => {
  it('should map hyphenated keys to camelCase', () => {
    const result = safeParseSuiteConfig({
      name: 'ivts',
      description: 'In-vehicle tests',
      version: '1.2.0',
      driver: 'bash',
      'test-file-patterns': ['*.sh'],
      'global-fixture': 'fixture.sh',
      targets: ['foo', 'bar']
    });

    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.data).toEqual({
        name: 'ivts',
        description: 'In-vehicle tests',
        version: '1.2.0',
        driver: 'bash',
        testFilePatterns: ['*.sh'],
        globalFixture: 'fixture.sh',
        targets: ['foo', 'bar']
      });
    }
  });

  it('should apply defaults to a minimal config', () => {
    const result = safeParseSuiteConfig({ name: 'smoke', driver: 'shell' });

    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.data).toEqual({
        name: 'smoke',
        description: '',
        version: undefined,
        driver: 'shell',
        testFilePatterns: [],
        globalFixture: undefined,
        targets: []
      });
    }
  });

  it('should reject a config without driver', () => {
    const result = safeParseSuiteConfig({ name: 'smoke' });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(formatConfigError(result.error)).toBe(
        'Configuration validation failed:\ndriver: Required'
      );
    }
  });

  it('should reject unknown keys', () => {
    const result = safeParseSuiteConfig({ name: 'smoke', driver: 'shell', devices: [] });
    expect(result.success).toBe(false);
  });
});

describe('RunSettingsSchema', () => {
  it('should fill in defaults', () => {
    expect(parseRunSettings({ suiteDirs: ['tests/ivts'] })).toEqual({
      suiteDirs: ['tests/ivts'],
      outDir: 'out',
      targets: [],
      strategy: 'round-robin',
      dryRun: false,
      debug: false,
      matrixSummary: false,
      concurrency: undefined,
      alwaysTeardown: false
    });
  });

  it('should require at least one suite directory', () => {
    expect(RunSettingsSchema.safeParse({ suiteDirs: [] }).success).toBe(false);
  });

  it('should reject a non positive concurrency', () => {
    expect(RunSettingsSchema.safeParse({ suiteDirs: ['a'], concurrency: 0 }).success).toBe(false);
  });
});
