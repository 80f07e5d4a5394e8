/**
 * Configuration schemas for benchrun
 * Using Zod for runtime validation and type inference
 */

import { z } from 'zod';
import { DEFAULT_OUT_DIR } from './constants.js';

/**
 * Execution strategies, in the order the CLI lists them
 */
export const EXECUTION_STRATEGIES = ['sequential', 'round-robin', 'parallel'] as const;

export const ExecutionStrategySchema = z
  .enum(EXECUTION_STRATEGIES)
  .describe('How the traversals of several targets are interleaved');

/**
 * Suite configuration as written in test-suite.json (hyphenated keys),
 * exposed to the code with camelCase keys
 */
export const SuiteConfigSchema = z
  .object({
    name: z.string().min(1).describe('Human readable suite name'),
    description: z.string().optional().default('').describe('Free text description'),
    version: z.string().optional().describe('Version of the suite'),
    driver: z.string().min(1).describe('Test driver used to discover and run the suite'),
    'test-file-patterns': z
      .array(z.string().min(1))
      .optional()
      .default([])
      .describe('Glob patterns selecting test files; empty means the driver defaults'),
    'global-fixture': z
      .string()
      .min(1)
      .optional()
      .describe('File holding the suite-level setup and teardown'),
    targets: z
      .array(z.string().min(1))
      .optional()
      .default([])
      .describe('Targets the suite can run against')
  })
  .strict()
  .transform((raw) => ({
    name: raw.name,
    description: raw.description,
    version: raw.version,
    driver: raw.driver,
    testFilePatterns: raw['test-file-patterns'],
    globalFixture: raw['global-fixture'],
    targets: raw.targets
  }));

/**
 * Settings of one invocation of the runner
 */
export const RunSettingsSchema = z.object({
  suiteDirs: z.array(z.string().min(1)).min(1).describe('Test suite directories'),
  outDir: z.string().min(1).default(DEFAULT_OUT_DIR).describe('Output root for logs and data'),
  targets: z
    .array(z.string().min(1))
    .default([])
    .describe('Targets to run on; empty selects every target of the suite'),
  strategy: ExecutionStrategySchema.default('round-robin'),
  dryRun: z.boolean().default(false).describe('Go through all tests but execute nothing'),
  debug: z.boolean().default(false).describe('Print additional diagnostics'),
  matrixSummary: z.boolean().default(false).describe('Summarize as a case x target matrix'),
  concurrency: z
    .number()
    .int()
    .positive()
    .optional()
    .describe('Maximum number of targets run at once by the parallel strategy'),
  alwaysTeardown: z
    .boolean()
    .default(false)
    .describe('Run teardown cases even when a setup failure asks to skip them')
});

export type ExecutionStrategy = z.infer<typeof ExecutionStrategySchema>;
export type SuiteConfig = z.output<typeof SuiteConfigSchema>;
export type RunSettingsInput = z.input<typeof RunSettingsSchema>;
export type RunSettings = z.output<typeof RunSettingsSchema>;

/**
 * Safe parse a suite configuration without throwing
 */
export function safeParseSuiteConfig(config: unknown) {
  return SuiteConfigSchema.safeParse(config);
}

/**
 * Parse and validate run settings, throws ZodError
 */
export function parseRunSettings(settings: unknown): RunSettings {
  return RunSettingsSchema.parse(settings);
}

/**
 * Format Zod error messages for human readability
 */
export function formatConfigError(error: z.ZodError): string {
  const messages = error.errors.map((issue) => {
    const path = issue.path.join('.');
    return path ? `${path}: ${issue.message}` : issue.message;
  });
  return `Configuration validation failed:\n${messages.join('\n')}`;
}
