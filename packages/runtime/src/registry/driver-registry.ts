import { ErrorHelpers, err, type Logger, ok, type Result, type TestDriver } from '@benchrun/core';
import type { ProcessRunner } from '../drivers/shell/process-runner.js';
import { SHELL_DRIVER_ALIASES, ShellTestDriver } from '../drivers/shell/shell-driver.js';

/**
 * Driver Registry - test drivers by name and alias
 */
export class DriverRegistry {
  private readonly drivers = new Map<string, TestDriver>();

  /**
   * Register a driver under its name and any aliases; a later registration wins
   */
  register(driver: TestDriver, aliases: readonly string[] = []): void {
    for (const name of [driver.name, ...aliases]) {
      this.drivers.set(name, driver);
    }
  }

  has(name: string): boolean {
    return this.drivers.has(name);
  }

  get(name: string): Result<TestDriver> {
    const driver = this.drivers.get(name);
    return driver ? ok(driver) : err(ErrorHelpers.unknownDriver(name));
  }

  /**
   * Registered names, aliases included, sorted
   */
  names(): string[] {
    return Array.from(this.drivers.keys()).sort();
  }
}

export type DefaultDriverOptions = {
  runner?: ProcessRunner;
  logger?: Logger;
};

/**
 * Registry holding the built-in drivers
 */
export function createDefaultDriverRegistry(options: DefaultDriverOptions = {}): DriverRegistry {
  const registry = new DriverRegistry();
  registry.register(
    new ShellTestDriver({ runner: options.runner, logger: options.logger }),
    SHELL_DRIVER_ALIASES
  );
  return registry;
}
