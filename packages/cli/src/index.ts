#!/usr/bin/env tsx

/**
 * benchrun CLI - Run test suites against one or more targets
 */

import { readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { BENCHRUN_NAME } from '@benchrun/core';
import { Command } from 'commander';
import { setupListCommand } from './commands/list.js';
import { setupRunCommand } from './commands/run.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

// Read package.json for version
const packageJson = JSON.parse(readFileSync(join(__dirname, '..', 'package.json'), 'utf-8')) as {
  version: string;
};

const program = new Command();

program
  .name(BENCHRUN_NAME)
  .description('Test suite orchestration across targets')
  .version(packageJson.version)
  .option('-v, --verbose', 'verbose logs')
  .option('-q, --quiet', 'errors only in logs');

setupRunCommand(program);
setupListCommand(program);

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error('Error:', error instanceof Error ? error.message : String(error));
  process.exit(1);
});
