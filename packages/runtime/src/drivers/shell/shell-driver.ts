/**
 * Shell test driver
 *
 * Test files are shell scripts. Every `test_*` function of a file is a test
 * case, `setup` and `teardown` are the file's fixture. The optional global
 * fixture file holds the suite's `setup` and `teardown`.
 *
 * A case runs in a fresh shell that sources the global fixture and the test
 * file, then calls the function with the target and the output directory.
 * Exit code 0 passes, 255 skips, anything else fails.
 */

import { writeFile } from 'node:fs/promises';
import { join, relative, resolve } from 'node:path';
import {
  BenchrunError,
  createSilentLogger,
  createSuite,
  createTestCase,
  createTestFile,
  type DriverTestStatus,
  ErrorCode,
  ErrorHelpers,
  err,
  findDuplicateTestCase,
  isErr,
  type Logger,
  ok,
  type Result,
  type RunTestOutput,
  type RunTestRequest,
  type Suite,
  type SuiteConfig,
  type SuiteFixture,
  type TestCase,
  type TestDriver,
  type TestFile,
  tryCatchAsync
} from '@benchrun/core';
import { glob } from 'glob';
import { NodeProcessRunner, type ProcessRunner } from './process-runner.js';

export const SHELL_DRIVER_NAME = 'shell';
export const SHELL_DRIVER_ALIASES = ['bash'];
export const DEFAULT_SHELL = 'bash';
export const SKIP_EXIT_CODE = 255;
export const SKIPPED_BY_TEST_CASE = 'skipped by test case';

const SETUP_FUNCTION = 'setup';
const TEARDOWN_FUNCTION = 'teardown';
const TEST_FUNCTION_PREFIX = 'test_';

/**
 * Variables handed to every shell the driver starts
 */
export const ShellEnv = {
  GLOBAL_FIXTURE: 'BENCHRUN_GLOBAL_FIXTURE',
  TEST_FILE: 'BENCHRUN_TEST_FILE',
  TEST_FUNCTION: 'BENCHRUN_TEST_FUNCTION',
  TARGET: 'BENCHRUN_TARGET',
  OUT_DIR: 'BENCHRUN_OUT_DIR'
} as const;

// Files are passed as absolute paths
const LIST_FUNCTIONS_SCRIPT = `source "$${ShellEnv.TEST_FILE}"; compgen -A function`;

const RUN_SCRIPT = `source "$${ShellEnv.TEST_FILE}"; "$${ShellEnv.TEST_FUNCTION}" "$${ShellEnv.TARGET}" "$${ShellEnv.OUT_DIR}"`;

const RUN_WITH_FIXTURE_SCRIPT = `source "$${ShellEnv.GLOBAL_FIXTURE}"; ${RUN_SCRIPT}`;

export type ShellDriverOptions = {
  runner?: ProcessRunner;
  shell?: string;
  logger?: Logger;
};

export const toDriverStatus = (code: number): DriverTestStatus => {
  if (code === 0) {
    return { state: 'passed' };
  }
  if (code === SKIP_EXIT_CODE) {
    return { state: 'skipped', message: SKIPPED_BY_TEST_CASE };
  }
  return { state: 'failed' };
};

export class ShellTestDriver implements TestDriver {
  readonly name = SHELL_DRIVER_NAME;
  private readonly runner: ProcessRunner;
  private readonly shell: string;
  private readonly logger: Logger;

  constructor(options: ShellDriverOptions = {}) {
    this.runner = options.runner ?? new NodeProcessRunner();
    this.shell = options.shell ?? DEFAULT_SHELL;
    this.logger = (options.logger ?? createSilentLogger()).child({ driver: SHELL_DRIVER_NAME });
  }

  defaultTestFilePatterns(): string[] {
    return ['*.sh', '*.bash'];
  }

  async discover(suiteDir: string, config: SuiteConfig): Promise<Result<Suite, BenchrunError>> {
    const paths = await this.findTestFiles(suiteDir, config);
    if (isErr(paths)) {
      return paths;
    }

    let fixture: SuiteFixture = {};
    if (config.globalFixture) {
      const functions = await this.listFunctions(suiteDir, config.globalFixture);
      if (isErr(functions)) {
        return functions;
      }
      fixture = {
        setup: functions.value.includes(SETUP_FUNCTION)
          ? createTestCase(config.globalFixture, SETUP_FUNCTION)
          : undefined,
        teardown: functions.value.includes(TEARDOWN_FUNCTION)
          ? createTestCase(config.globalFixture, TEARDOWN_FUNCTION)
          : undefined
      };
    }

    const files: TestFile[] = [];
    for (const path of paths.value) {
      const functions = await this.listFunctions(suiteDir, path);
      if (isErr(functions)) {
        return functions;
      }
      files.push(toTestFile(path, functions.value));
    }

    const suite = createSuite({ path: suiteDir, config, fixture, files });
    const duplicate = findDuplicateTestCase(suite);
    if (duplicate !== undefined) {
      return err(ErrorHelpers.duplicateTestCase(duplicate, suiteDir));
    }

    this.logger.debug({ suiteDir, files: files.length }, 'Discovered shell suite');
    return ok(suite);
  }

  async run(request: RunTestRequest): Promise<Result<RunTestOutput, BenchrunError>> {
    const { testCase, config } = request;
    const context = { suiteDir: request.suiteDir, target: request.target };
    // The global fixture's own cases source it as their test file
    const fixtureFile = config.globalFixture !== testCase.path ? config.globalFixture : undefined;

    const env: Record<string, string> = {
      [ShellEnv.TEST_FILE]: resolve(request.suiteDir, testCase.path),
      [ShellEnv.TEST_FUNCTION]: testCase.name,
      [ShellEnv.TARGET]: request.target,
      [ShellEnv.OUT_DIR]: request.outDir
    };
    if (fixtureFile) {
      env[ShellEnv.GLOBAL_FIXTURE] = resolve(request.suiteDir, fixtureFile);
    }

    const output = await tryCatchAsync(
      () =>
        this.runner.run(this.shell, ['-c', fixtureFile ? RUN_WITH_FIXTURE_SCRIPT : RUN_SCRIPT], {
          cwd: request.suiteDir,
          env,
          signal: request.signal
        }),
      (error) =>
        new BenchrunError(
          ErrorCode.E_DRIVER_SPAWN_FAILED,
          `cannot start \`${this.shell}\` for \`${testCase.path}::${testCase.name}\``,
          { context, cause: error }
        )
    );
    if (isErr(output)) {
      return output;
    }

    const logPath = join(request.outDir, `${testCase.name}.log`);
    const written = await tryCatchAsync(
      () => writeFile(logPath, output.value.combined, 'utf-8'),
      (error) =>
        new BenchrunError(ErrorCode.E_DRIVER_RUN_FAILED, `cannot write log \`${logPath}\``, {
          context,
          cause: error
        })
    );
    if (isErr(written)) {
      return written;
    }

    this.logger.debug(
      { testCase: `${testCase.path}::${testCase.name}`, code: output.value.code },
      'Shell test case exited'
    );
    return ok({ status: toDriverStatus(output.value.code), driverOutput: logPath });
  }

  private async findTestFiles(suiteDir: string, config: SuiteConfig): Promise<Result<string[]>> {
    const patterns =
      config.testFilePatterns.length > 0 ? config.testFilePatterns : this.defaultTestFilePatterns();

    return tryCatchAsync(
      async () => {
        const matches = await glob(patterns, {
          cwd: suiteDir,
          nodir: true,
          matchBase: true,
          posix: true,
          ignore: config.globalFixture
            ? [relative(suiteDir, resolve(suiteDir, config.globalFixture))]
            : []
        });
        return Array.from(new Set(matches)).sort(comparePaths);
      },
      (error) => BenchrunError.from(error, ErrorCode.E_SYSTEM_FS_ERROR, { suiteDir })
    );
  }

  /**
   * Names of the functions a file defines, as listed by the shell
   */
  private async listFunctions(suiteDir: string, path: string): Promise<Result<string[]>> {
    const output = await tryCatchAsync(
      () =>
        this.runner.run(this.shell, ['-c', LIST_FUNCTIONS_SCRIPT], {
          cwd: suiteDir,
          env: { [ShellEnv.TEST_FILE]: resolve(suiteDir, path) }
        }),
      (error) =>
        new BenchrunError(ErrorCode.E_DRIVER_SPAWN_FAILED, `cannot start \`${this.shell}\``, {
          context: { suiteDir },
          cause: error
        })
    );
    if (isErr(output)) {
      return output;
    }

    const functions = output.value.stdout
      .split('\n')
      .map((line) => line.trim())
      .filter((line) => line.length > 0);
    const stderr = output.value.stderr.trim();

    // A file that defines nothing and complains was not sourced
    if (functions.length === 0 && stderr.length > 0) {
      return err(
        new BenchrunError(
          ErrorCode.E_DRIVER_TEST_FILE_EXEC,
          `cannot source test file \`${path}\``,
          { context: { suiteDir }, cause: stderr }
        )
      );
    }

    return ok(functions);
  }
}

/**
 * Order relative paths component by component, so that the files of a
 * directory stay together
 */
export const comparePaths = (a: string, b: string): number => {
  const left = a.split('/');
  const right = b.split('/');
  for (let i = 0; i < Math.min(left.length, right.length); i++) {
    const [x = '', y = ''] = [left[i], right[i]];
    if (x !== y) {
      return x < y ? -1 : 1;
    }
  }
  return left.length - right.length;
};

const toTestFile = (path: string, functions: readonly string[]): TestFile => {
  const has = (name: string) => functions.includes(name);
  const testCases: TestCase[] = functions
    .filter((name) => name.startsWith(TEST_FUNCTION_PREFIX))
    .map((name) => createTestCase(path, name));

  return createTestFile({
    path,
    setup: has(SETUP_FUNCTION) ? createTestCase(path, SETUP_FUNCTION) : undefined,
    teardown: has(TEARDOWN_FUNCTION) ? createTestCase(path, TEARDOWN_FUNCTION) : undefined,
    testCases
  });
};
