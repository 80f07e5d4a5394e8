/**
 * @benchrun/runtime - Traversal, execution and drivers for benchrun
 */

// Suite configuration
export { loadSuiteConfig, parseSuiteConfig, suiteConfigPath } from './config/suite-config.js';

// Shell driver
export {
  NodeProcessRunner,
  type ProcessOutput,
  type ProcessRunner,
  type ProcessRunOptions
} from './drivers/shell/process-runner.js';
export {
  comparePaths,
  DEFAULT_SHELL,
  SHELL_DRIVER_ALIASES,
  SHELL_DRIVER_NAME,
  type ShellDriverOptions,
  ShellEnv,
  ShellTestDriver,
  SKIP_EXIT_CODE,
  SKIPPED_BY_TEST_CASE,
  toDriverStatus
} from './drivers/shell/shell-driver.js';

// Execution
export { type ExecuteSuiteOptions, executeSuite } from './execution/engine.js';
export {
  CaseRecord,
  ExecutionContext,
  type ExecutionContextOptions
} from './execution/execution-context.js';
export {
  CANCELLED_REASON,
  createExecutor,
  type ExecuteOptions,
  type Executor,
  type ExecutorOptions,
  ParallelExecutor,
  RoundRobinExecutor,
  SequentialExecutor
} from './execution/strategies.js';

// Registries
export {
  createDefaultDriverRegistry,
  type DefaultDriverOptions,
  DriverRegistry
} from './registry/driver-registry.js';
export { type LoadedSuite, SuiteRegistry } from './registry/suite-registry.js';

// Traversal
export {
  listTestCases,
  Traversal,
  type TraversalPhase,
  type TraversalState,
  type Visit,
  type Visitor
} from './traversal/traversal.js';
