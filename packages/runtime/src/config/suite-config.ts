/**
 * Suite configuration loader with Result pattern
 *
 * `test-suite.json` lives in the suite directory. Comments and trailing commas
 * are accepted.
 */

import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import {
  BenchrunError,
  ErrorCode,
  err,
  formatConfigError,
  ok,
  type Result,
  SUITE_CONFIG_FILENAME,
  type SuiteConfig,
  safeParseSuiteConfig
} from '@benchrun/core';
import { type ParseError, parse, printParseErrorCode } from 'jsonc-parser';

const isMissingFile = (error: unknown): boolean =>
  error instanceof Error && 'code' in error && error.code === 'ENOENT';

export const suiteConfigPath = (suiteDir: string): string => join(suiteDir, SUITE_CONFIG_FILENAME);

/**
 * Parse and validate the text of a suite configuration
 */
export const parseSuiteConfig = (text: string, configPath: string): Result<SuiteConfig> => {
  const errors: ParseError[] = [];
  const raw: unknown = parse(text, errors, { allowTrailingComma: true });

  const [first] = errors;
  if (first) {
    return err(
      new BenchrunError(
        ErrorCode.E_CONFIG_PARSE_ERROR,
        `cannot parse \`${configPath}\`: ${printParseErrorCode(first.error)} at offset ${first.offset}`,
        { context: { configPath } }
      )
    );
  }

  const parsed = safeParseSuiteConfig(raw);
  if (!parsed.success) {
    return err(
      new BenchrunError(ErrorCode.E_CONFIG_VALIDATION_FAILED, formatConfigError(parsed.error), {
        context: { configPath }
      })
    );
  }

  return ok(parsed.data);
};

/**
 * Read the configuration of a suite directory
 */
export const loadSuiteConfig = async (suiteDir: string): Promise<Result<SuiteConfig>> => {
  const configPath = suiteConfigPath(suiteDir);

  let text: string;
  try {
    text = await readFile(configPath, 'utf-8');
  } catch (error) {
    return err(
      isMissingFile(error)
        ? new BenchrunError(
            ErrorCode.E_CONFIG_NOT_FOUND,
            `no ${SUITE_CONFIG_FILENAME} found in \`${suiteDir}\``,
            { context: { suiteDir, configPath }, cause: error }
          )
        : new BenchrunError(ErrorCode.E_CONFIG_READ_FAILED, `cannot read \`${configPath}\``, {
            context: { suiteDir, configPath },
            cause: error
          })
    );
  }

  return parseSuiteConfig(text, configPath);
};
