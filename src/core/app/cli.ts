/**
 * CLI Entry Point - Command line argument handling
 */

import { existsSync, readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { ConfigError } from '../errors.js';
import type { LogLevel, RuntimeFlags } from '../kernel/contracts.js';

export interface CliOptions {
  flags: RuntimeFlags;
  /** Reclaim the port from a previous instance before binding. */
  restart: boolean;
  help: boolean;
  version: boolean;
}

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

function parsePort(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0 || parsed > 65535) {
    throw new ConfigError(`Invalid port: ${value}`);
  }
  return parsed;
}

export function parseCliArgs(args: string[]): CliOptions {
  const options: CliOptions = { flags: {}, restart: false, help: false, version: false };

  const valueOf = (index: number, name: string): string => {
    const value = args[index + 1];
    if (value === undefined || value.startsWith('--')) {
      throw new ConfigError(`Missing value for ${name}`);
    }
    return value;
  };

  for (let i = 0; i < args.length; i++) {
    const item = args[i];
    switch (item) {
      case '-h':
      case '--help':
        options.help = true;
        break;
      case '-v':
      case '--version':
        options.version = true;
        break;
      case '--restart':
        options.restart = true;
        break;
      case '--host':
        options.flags.host = valueOf(i, item);
        i++;
        break;
      case '--port':
        options.flags.port = parsePort(valueOf(i, item));
        i++;
        break;
      case '--config':
        options.flags.configPath = valueOf(i, item);
        i++;
        break;
      case '--driver':
        options.flags.driver = valueOf(i, item);
        i++;
        break;
      case '--log-level': {
        const level = valueOf(i, item);
        if (!isLogLevel(level)) {
          throw new ConfigError(`Invalid log level: ${level}`);
        }
        options.flags.logLevel = level;
        i++;
        break;
      }
      default:
        throw new ConfigError(`Unknown argument: ${item}`);
    }
  }

  return options;
}

export const USAGE = `tabrelay - browser task relay over a single WebSocket

Usage:
  tabrelay [options]

Options:
  --host HOST          Interface to bind (default 127.0.0.1)
  --port PORT          Port to bind (default 8765)
  --config FILE        User config file (default ~/.tabrelay/config.json)
  --driver PATH        Agent driver module, or "dry-run"
  --restart            Reclaim the port from a running instance first
  --log-level LEVEL    debug | info | warn | error
  -h, --help           Show this help
  -v, --version        Show version
`;

function findPackageJson(): string | null {
  let dir = dirname(fileURLToPath(import.meta.url));
  while (dir !== dirname(dir)) {
    const candidate = join(dir, 'package.json');
    if (existsSync(candidate)) return candidate;
    dir = dirname(dir);
  }
  return null;
}

export function readVersion(): string {
  const path = findPackageJson();
  if (!path) return '0.0.0';
  const parsed: unknown = JSON.parse(readFileSync(path, 'utf8'));
  if (parsed && typeof parsed === 'object' && 'version' in parsed && typeof parsed.version === 'string') {
    return parsed.version;
  }
  return '0.0.0';
}
