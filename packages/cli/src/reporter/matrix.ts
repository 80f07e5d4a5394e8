/**
 * Test case x target matrix of a suite's executions
 */

import { type ExecutionView, type Suite, type TestCaseStatus, testCaseId } from '@benchrun/core';
import { listTestCases } from '@benchrun/runtime';
import type { ChalkInstance } from 'chalk';
import Table from 'cli-table3';

export const MatrixChar = {
  PASS: 'V',
  FAIL: 'X',
  RUNNER_FAIL: 'O',
  SKIP: '>',
  UNKNOWN: '?'
} as const;

export type MatrixChar = (typeof MatrixChar)[keyof typeof MatrixChar];

export function matrixChar(status: TestCaseStatus | undefined): MatrixChar {
  switch (status?.state) {
    case 'passed':
      return MatrixChar.PASS;
    case 'failed':
      return MatrixChar.FAIL;
    case 'runner-failed':
      return MatrixChar.RUNNER_FAIL;
    case 'skipped':
    case 'dry-run':
      return MatrixChar.SKIP;
    default:
      // Not run or left running by a cancelled run
      return MatrixChar.UNKNOWN;
  }
}

/**
 * One row per test case in traversal order: the id, then one character per
 * execution
 */
export function buildMatrixRows(suite: Suite, executions: readonly ExecutionView[]): string[][] {
  return listTestCases(suite).map((testCase) => [
    testCaseId(testCase),
    ...executions.map((execution) => matrixChar(execution.record(testCase)?.status))
  ]);
}

const colorize = (chalk: ChalkInstance, char: string): string => {
  switch (char) {
    case MatrixChar.PASS:
      return chalk.green(char);
    case MatrixChar.FAIL:
    case MatrixChar.RUNNER_FAIL:
      return chalk.red(char);
    default:
      return chalk.dim(char);
  }
};

export function renderMatrix(
  suite: Suite,
  executions: readonly ExecutionView[],
  chalk: ChalkInstance
): string {
  const table = new Table({
    head: ['Test case', ...executions.map((execution) => execution.target)],
    style: {
      head: chalk.level > 0 ? ['cyan'] : [],
      border: []
    }
  });

  for (const [id = '', ...chars] of buildMatrixRows(suite, executions)) {
    table.push([id, ...chars.map((char) => colorize(chalk, char))]);
  }

  return table.toString();
}
