export {
  buildSuite,
  buildSuiteConfig,
  FIXTURE_FILE,
  type FileDefinition,
  type SuiteDefinition
} from './suite-builder.js';
export {
  createFakeDriver,
  FAKE_SKIP_MESSAGE,
  type FakeDriver,
  type FakeDriverCall,
  type FakeDriverOptions,
  type FakeOutcome
} from './fake-driver.js';
export { RecordingReporter, type ReporterEvent } from './recording-reporter.js';
export { cleanupTempDir, createTempDir, writeFiles } from './temp-utils.js';
