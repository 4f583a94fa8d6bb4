import type { JsonValue, LogLevel, StructuredLogger } from './contracts.js';

const LEVELS = ['debug', 'info', 'warn', 'error'] as const satisfies readonly LogLevel[];

export interface LogEntry {
  ts: string;
  level: LogLevel;
  message: string;
  fields?: Record<string, JsonValue>;
}

export interface RelayLogger extends StructuredLogger {
  subscribe: (listener: (entry: LogEntry) => void) => () => void;
  setTerminalOutputEnabled: (enabled: boolean) => void;
  /** Derive a logger that merges `fields` into every entry. */
  child: (fields: Record<string, JsonValue>) => StructuredLogger;
}

function shouldLog(current: LogLevel, incoming: LogLevel): boolean {
  return LEVELS.indexOf(incoming) >= LEVELS.indexOf(current);
}

export function createLogger(level: LogLevel = 'info'): RelayLogger {
  const listeners = new Set<(entry: LogEntry) => void>();
  let terminalOutputEnabled = true;

  const write = (incoming: LogLevel, message: string, fields?: Record<string, JsonValue>): void => {
    if (!shouldLog(level, incoming)) {
      return;
    }

    const payload: LogEntry = {
      ts: new Date().toISOString(),
      level: incoming,
      message,
      ...(fields ? { fields } : {})
    };

    for (const listener of listeners) {
      try {
        listener(payload);
      } catch {
        // Logging listeners should never break runtime execution.
      }
    }

    if (!terminalOutputEnabled) {
      return;
    }

    // stdout is left to the CLI banner; machine logs go to stderr.
    process.stderr.write(`${JSON.stringify(payload)}\n`);
  };

  const scoped = (base: Record<string, JsonValue>): StructuredLogger => ({
    debug: (message, fields) => write('debug', message, { ...base, ...fields }),
    info: (message, fields) => write('info', message, { ...base, ...fields }),
    warn: (message, fields) => write('warn', message, { ...base, ...fields }),
    error: (message, fields) => write('error', message, { ...base, ...fields }),
  });

  return {
    debug: (message, fields) => write('debug', message, fields),
    info: (message, fields) => write('info', message, fields),
    warn: (message, fields) => write('warn', message, fields),
    error: (message, fields) => write('error', message, fields),
    subscribe: (listener) => {
      listeners.add(listener);
      return () => listeners.delete(listener);
    },
    setTerminalOutputEnabled: (enabled) => {
      terminalOutputEnabled = enabled;
    },
    child: scoped
  };
}
