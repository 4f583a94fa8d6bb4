/**
 * Resolves the configured agent driver into an {@link AgentDriver}.
 *
 * `dry-run` maps to the bundled driver. Anything else is a path, relative to
 * the working directory, to an ES module whose default export (or named
 * `createAgentDriver` export) is an {@link AgentDriverFactory}.
 */
import { resolve } from 'node:path';
import { pathToFileURL } from 'node:url';
import { DriverLoadError, errorMessage } from '../errors.js';
import type { AgentDriver, AgentDriverFactoryInput } from '../kernel/contracts.js';
import { DRY_RUN_DRIVER_ID, createDryRunDriver } from './dry-run-driver.js';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

export function isAgentDriver(value: unknown): value is AgentDriver {
  return (
    isRecord(value) &&
    typeof value.id === 'string' &&
    typeof value.createSession === 'function' &&
    typeof value.createAgent === 'function'
  );
}

function pickFactory(module: unknown): Function | undefined {
  if (!isRecord(module)) {
    return undefined;
  }
  if (typeof module.default === 'function') {
    return module.default;
  }
  if (typeof module.createAgentDriver === 'function') {
    return module.createAgentDriver;
  }
  return undefined;
}

export async function loadAgentDriver(
  driver: string,
  input: AgentDriverFactoryInput,
  cwd: string = process.cwd(),
): Promise<AgentDriver> {
  if (driver === DRY_RUN_DRIVER_ID) {
    return createDryRunDriver(input);
  }

  const entryPath = resolve(cwd, driver);
  let module: unknown;
  try {
    module = await import(pathToFileURL(entryPath).href);
  } catch (error) {
    throw new DriverLoadError(`Could not import agent driver ${entryPath}: ${errorMessage(error)}`, driver);
  }

  const factory = pickFactory(module);
  if (!factory) {
    throw new DriverLoadError(`Agent driver module ${entryPath} exports no driver factory`, driver);
  }

  const instance: unknown = factory(input);
  if (!isAgentDriver(instance)) {
    throw new DriverLoadError(`Agent driver factory in ${entryPath} returned an invalid driver`, driver);
  }

  input.logger.info('Agent driver loaded', { driver: instance.id, path: entryPath });
  return instance;
}
