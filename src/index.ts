#!/usr/bin/env node
/**
 * tabrelay - single-operator WebSocket relay for browser automation tasks.
 */

import 'reflect-metadata';
import { parseCliArgs, readVersion, USAGE } from './core/app/cli.js';
import type { Relay } from './core/app/relay.js';
import { setupSignalHandlers } from './core/app/signals.js';
import { loadRuntimeConfig } from './core/config/runtime-config.js';
import { createRelayContainer, TYPES } from './core/di/container.js';
import { RelayError, errorMessage } from './core/errors.js';
import type { RelayLogger } from './core/kernel/logger.js';

async function main(): Promise<number> {
  const cli = parseCliArgs(process.argv.slice(2));

  if (cli.help) {
    process.stdout.write(USAGE);
    return 0;
  }
  if (cli.version) {
    process.stdout.write(`tabrelay v${readVersion()}\n`);
    return 0;
  }

  const config = await loadRuntimeConfig(cli.flags);
  const container = await createRelayContainer({ config });
  const logger = container.get<RelayLogger>(TYPES.Logger);
  const relay = container.get<Relay>(TYPES.Relay);

  const cleanupSignalHandlers = setupSignalHandlers({ stop: () => relay.stop(), logger });
  try {
    await relay.start({ reclaim: cli.restart });
    process.stdout.write(`tabrelay listening on ws://${config.gateway.host}:${relay.port}\n`);
    await relay.closed;
    if (relay.fatalError) {
      throw relay.fatalError;
    }
  } finally {
    cleanupSignalHandlers();
  }
  return 0;
}

main()
  .then((code) => {
    process.exit(code);
  })
  .catch((error: unknown) => {
    const code = error instanceof RelayError ? error.code : 'FATAL';
    process.stderr.write(`${JSON.stringify({ ts: new Date().toISOString(), level: 'error', message: errorMessage(error), fields: { code } })}\n`);
    process.exit(1);
  });
