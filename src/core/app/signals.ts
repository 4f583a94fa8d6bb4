/**
 * Signal Handlers - Process signal management
 */

import { errorMessage } from '../errors.js';
import type { StructuredLogger } from '../kernel/contracts.js';

interface SignalContext {
  stop: () => Promise<void>;
  logger: StructuredLogger;
}

/**
 * Stop the relay on SIGINT/SIGTERM and keep running through stray errors.
 * @returns Cleanup function to remove all signal handlers
 */
export function setupSignalHandlers(context: SignalContext): () => void {
  const { logger } = context;
  let stopping = false;

  const stopHandler = (signal: NodeJS.Signals) => {
    if (stopping) return;
    stopping = true;
    logger.info('Received signal, shutting down', { signal });
    context.stop().catch((error: unknown) => {
      logger.error('Shutdown failed', { error: errorMessage(error) });
      process.exitCode = 1;
    });
  };

  // A failing unit of work must not take the relay down.
  const uncaughtExceptionHandler = (err: Error) => {
    logger.error('Uncaught exception', { error: err.message });
  };

  const unhandledRejectionHandler = (reason: unknown) => {
    logger.error('Unhandled rejection', { error: errorMessage(reason) });
  };

  process.on('SIGINT', stopHandler);
  process.on('SIGTERM', stopHandler);
  process.on('uncaughtException', uncaughtExceptionHandler);
  process.on('unhandledRejection', unhandledRejectionHandler);

  return () => {
    process.off('SIGINT', stopHandler);
    process.off('SIGTERM', stopHandler);
    process.off('uncaughtException', uncaughtExceptionHandler);
    process.off('unhandledRejection', unhandledRejectionHandler);
  };
}
