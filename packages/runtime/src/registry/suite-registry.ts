import { resolve } from 'node:path';
import {
  createSilentLogger,
  ErrorHelpers,
  err,
  findDuplicateTestCase,
  isErr,
  type Logger,
  ok,
  type Result,
  type Suite,
  type TestDriver
} from '@benchrun/core';
import { loadSuiteConfig } from '../config/suite-config.js';
import type { DriverRegistry } from './driver-registry.js';

/**
 * A discovered suite with the driver that runs it
 */
export type LoadedSuite = {
  suite: Suite;
  driver: TestDriver;
};

/**
 * Suite Registry - suites loaded from their directories
 *
 * Loading reads the suite configuration, resolves its driver and lets the
 * driver discover the suite. A failure only affects the suite being loaded.
 */
export class SuiteRegistry {
  private readonly suites = new Map<string, LoadedSuite>();
  private readonly logger: Logger;

  constructor(
    private readonly drivers: DriverRegistry,
    logger?: Logger
  ) {
    this.logger = logger ?? createSilentLogger();
  }

  async loadSuite(suiteDir: string): Promise<Result<LoadedSuite>> {
    const path = resolve(suiteDir);

    const config = await loadSuiteConfig(path);
    if (isErr(config)) {
      return config;
    }

    const driver = this.drivers.get(config.value.driver);
    if (isErr(driver)) {
      return driver;
    }

    const discovered = await driver.value.discover(path, config.value);
    if (isErr(discovered)) {
      return discovered;
    }

    const duplicate = findDuplicateTestCase(discovered.value);
    if (duplicate !== undefined) {
      return err(ErrorHelpers.duplicateTestCase(duplicate, path));
    }

    const loaded = { suite: discovered.value, driver: driver.value };
    this.suites.set(path, loaded);
    this.logger.debug(
      { suiteDir: path, suite: config.value.name, driver: driver.value.name },
      'Loaded test suite'
    );
    return ok(loaded);
  }

  get(suiteDir: string): Result<LoadedSuite> {
    const path = resolve(suiteDir);
    const loaded = this.suites.get(path);
    return loaded ? ok(loaded) : err(ErrorHelpers.unknownSuite(path));
  }

  /**
   * Loaded suites in load order
   */
  list(): LoadedSuite[] {
    return Array.from(this.suites.values());
  }
}
