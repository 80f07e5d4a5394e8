/**
 * Suite model
 *
 * Immutable once a driver's discovery step has built it. Runtime state never
 * lives here: execution contexts key their records by test case id.
 */

import { TEST_CASE_ID_SEPARATOR } from '../constants.js';
import type { SuiteConfig } from '../schemas.js';

/**
 * A runnable unit, identified by its file path (relative to the suite
 * directory) and its name
 */
export type TestCase = {
  readonly path: string;
  readonly name: string;
};

export type TestFile = {
  readonly path: string;
  readonly setup?: TestCase;
  readonly teardown?: TestCase;
  readonly testCases: readonly TestCase[];
};

/**
 * Setup and teardown scoped to the whole suite
 */
export type SuiteFixture = {
  readonly setup?: TestCase;
  readonly teardown?: TestCase;
};

export type Suite = {
  /** Absolute path of the suite directory */
  readonly path: string;
  readonly config: SuiteConfig;
  readonly fixture: SuiteFixture;
  /** Sorted by path */
  readonly files: readonly TestFile[];
};

export function createTestCase(path: string, name: string): TestCase {
  return Object.freeze({ path, name });
}

/**
 * Identity of a test case, `path::name`
 */
export function testCaseId(testCase: TestCase): string {
  return `${testCase.path}${TEST_CASE_ID_SEPARATOR}${testCase.name}`;
}

export function createTestFile(file: {
  path: string;
  setup?: TestCase;
  teardown?: TestCase;
  testCases?: readonly TestCase[];
}): TestFile {
  return Object.freeze({
    path: file.path,
    setup: file.setup,
    teardown: file.teardown,
    testCases: Object.freeze([...(file.testCases ?? [])])
  });
}

export function createSuite(suite: {
  path: string;
  config: SuiteConfig;
  fixture?: SuiteFixture;
  files?: readonly TestFile[];
}): Suite {
  return Object.freeze({
    path: suite.path,
    config: suite.config,
    fixture: Object.freeze({ ...suite.fixture }),
    files: Object.freeze([...(suite.files ?? [])])
  });
}

/**
 * Every test case of a suite, in traversal order
 */
function* allTestCases(suite: Suite): Generator<TestCase> {
  if (suite.fixture.setup) yield suite.fixture.setup;
  for (const file of suite.files) {
    if (file.setup) yield file.setup;
    yield* file.testCases;
    if (file.teardown) yield file.teardown;
  }
  if (suite.fixture.teardown) yield suite.fixture.teardown;
}

/**
 * Id of the first test case declared twice, if any
 */
export function findDuplicateTestCase(suite: Suite): string | undefined {
  const seen = new Set<string>();
  for (const testCase of allTestCases(suite)) {
    const id = testCaseId(testCase);
    if (seen.has(id)) {
      return id;
    }
    seen.add(id);
  }
  return undefined;
}
