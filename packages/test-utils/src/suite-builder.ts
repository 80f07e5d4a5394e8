import {
  createSuite,
  createTestCase,
  createTestFile,
  type Suite,
  type SuiteConfig,
  SuiteConfigSchema
} from '@benchrun/core';

export const FIXTURE_FILE = 'fixture.sh';

export type FileDefinition = {
  path: string;
  setup?: boolean;
  teardown?: boolean;
  cases?: string[];
};

export type SuiteDefinition = {
  name?: string;
  path?: string;
  targets?: string[];
  /** Suite fixture cases, declared in `fixture.sh` */
  setup?: boolean;
  teardown?: boolean;
  files?: FileDefinition[];
};

export function buildSuiteConfig(definition: { name?: string; targets?: string[] } = {}): SuiteConfig {
  return SuiteConfigSchema.parse({
    name: definition.name ?? 'sample',
    driver: 'fake',
    targets: definition.targets ?? []
  });
}

/**
 * Build a suite from a compact definition. Setup and teardown cases are named
 * `setup` and `teardown`, as the shell driver names them.
 */
export function buildSuite(definition: SuiteDefinition = {}): Suite {
  return createSuite({
    path: definition.path ?? '/suites/sample',
    config: buildSuiteConfig(definition),
    fixture: {
      setup: definition.setup ? createTestCase(FIXTURE_FILE, 'setup') : undefined,
      teardown: definition.teardown ? createTestCase(FIXTURE_FILE, 'teardown') : undefined
    },
    files: (definition.files ?? []).map((file) =>
      createTestFile({
        path: file.path,
        setup: file.setup ? createTestCase(file.path, 'setup') : undefined,
        teardown: file.teardown ? createTestCase(file.path, 'teardown') : undefined,
        testCases: (file.cases ?? []).map((name) => createTestCase(file.path, name))
      })
    )
  });
}
