/**
 * @module runtime-config
 *
 * Loads, validates, and merges the relay runtime configuration from multiple
 * sources (user-global, cwd-local, environment) using a layered deep-merge
 * strategy. Configuration is validated against a strict Zod schema and runtime
 * CLI flags are applied as final overrides.
 *
 * Key exports:
 * - {@link loadRuntimeConfig} - Main entry point to load and merge config
 * - {@link resolveConfigSources} - Resolve the config file paths
 * - {@link DEFAULT_CONFIG} - Built-in defaults
 */
import { promises as fs } from 'node:fs';
import { join, resolve } from 'node:path';
import { homedir } from 'node:os';
import { z } from 'zod';
import { ConfigError } from '../errors.js';
import type { JsonValue, RuntimeConfig, RuntimeFlags } from '../kernel/contracts.js';

const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(JsonValueSchema),
    z.record(z.string(), JsonValueSchema),
  ])
);

const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error']);

const RuntimeConfigSchema: z.ZodType<RuntimeConfig, z.ZodTypeDef, unknown> = z.object({
  gateway: z.object({
    host: z.string().min(1),
    port: z.number().int().min(1).max(65_535),
    bindRetries: z.number().int().min(1),
    bindBackoffMs: z.number().int().nonnegative(),
  }).strict(),
  reclaim: z.object({
    connectTimeoutMs: z.number().int().positive(),
    gracefulWaitMs: z.number().int().nonnegative(),
    forceWaitMs: z.number().int().nonnegative(),
  }).strict(),
  tasks: z.object({
    defaultKey: z.string().min(1),
    maxAgentFailures: z.number().int().nonnegative(),
    cancelGraceMs: z.number().int().nonnegative(),
    escalationStepTimeoutMs: z.number().int().positive(),
    untargetedKill: z.enum(['global', 'ignore']),
  }).strict(),
  intervention: z.object({
    timeoutMs: z.number().int().positive(),
  }).strict(),
  agent: z.object({
    driver: z.string().min(1),
    options: z.record(z.string(), JsonValueSchema),
  }).strict(),
  logging: z.object({
    level: LogLevelSchema,
  }).strict(),
}).strict();

/** Resolved file paths for the configuration layers. */
export interface ConfigSources {
  /** Path to the user-global config (default: ~/.tabrelay/config.json). */
  userConfigPath: string;
  /** Path to the current-working-directory config (.tabrelay/config.json relative to cwd). */
  cwdConfigPath: string;
}

export const DEFAULT_CONFIG: RuntimeConfig = {
  gateway: {
    host: '127.0.0.1',
    port: 8765,
    bindRetries: 5,
    bindBackoffMs: 1_000
  },
  reclaim: {
    connectTimeoutMs: 2_000,
    gracefulWaitMs: 2_000,
    forceWaitMs: 1_000
  },
  tasks: {
    defaultKey: 'current',
    maxAgentFailures: 3,
    cancelGraceMs: 10_000,
    escalationStepTimeoutMs: 2_000,
    untargetedKill: 'global'
  },
  intervention: {
    // Eight hours: an operator may walk away from a captcha.
    timeoutMs: 8 * 60 * 60 * 1_000
  },
  agent: {
    driver: 'dry-run',
    options: {}
  },
  logging: {
    level: 'info'
  }
};

type PlainObject = Record<string, unknown>;

function isPlainObject(value: unknown): value is PlainObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function deepMerge(base: PlainObject, override?: PlainObject): PlainObject {
  if (!override) {
    return structuredClone(base);
  }

  const output: PlainObject = { ...base };

  for (const [key, value] of Object.entries(override)) {
    if (value === undefined) {
      continue;
    }

    const baseValue = output[key];
    if (isPlainObject(value) && isPlainObject(baseValue)) {
      output[key] = deepMerge(baseValue, value);
      continue;
    }

    output[key] = value;
  }

  return output;
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

async function readOptionalJson(path: string): Promise<PlainObject | undefined> {
  let raw: string;
  try {
    raw = await fs.readFile(path, 'utf8');
  } catch (error) {
    if (isMissingFile(error)) {
      return undefined;
    }
    throw error;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new ConfigError(`Invalid JSON in ${path}: ${error instanceof Error ? error.message : String(error)}`);
  }
  if (!isPlainObject(parsed)) {
    throw new ConfigError(`Config root must be an object: ${path}`);
  }
  return parsed;
}

/**
 * Resolves the configuration file paths from optional CLI flags (e.g. an
 * explicit `--config` path).
 */
export function resolveConfigSources(flags: RuntimeFlags, cwd: string = process.cwd()): ConfigSources {
  return {
    userConfigPath: flags.configPath ?? join(homedir(), '.tabrelay', 'config.json'),
    cwdConfigPath: resolve(cwd, '.tabrelay', 'config.json')
  };
}

function numberFromEnv(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') {
    return undefined;
  }
  return Number(value);
}

/**
 * Overrides read from `TABRELAY_*` variables. Values are left unvalidated here;
 * the schema rejects them with the rest of the merged document.
 */
export function configFromEnv(env: NodeJS.ProcessEnv): PlainObject {
  return {
    gateway: {
      host: env.TABRELAY_HOST,
      port: numberFromEnv(env.TABRELAY_PORT),
    },
    tasks: {
      untargetedKill: env.TABRELAY_UNTARGETED_KILL,
    },
    intervention: {
      timeoutMs: numberFromEnv(env.TABRELAY_INTERVENTION_TIMEOUT_MS),
    },
    agent: {
      driver: env.TABRELAY_DRIVER,
    },
    logging: {
      level: env.TABRELAY_LOG_LEVEL,
    },
  };
}

function applyRuntimeFlags(config: RuntimeConfig, flags: RuntimeFlags): RuntimeConfig {
  const next = structuredClone(config);

  if (flags.host) {
    next.gateway.host = flags.host;
  }
  if (flags.port !== undefined) {
    next.gateway.port = flags.port;
  }
  if (flags.driver) {
    next.agent.driver = flags.driver;
  }
  if (flags.logLevel) {
    next.logging.level = flags.logLevel;
  }

  return next;
}

/** Validates a merged document, reporting every issue in one {@link ConfigError}. */
export function parseRuntimeConfig(input: unknown): RuntimeConfig {
  const result = RuntimeConfigSchema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid runtime config: ${issues}`);
  }
  return result.data;
}

export interface LoadRuntimeConfigOptions {
  env?: NodeJS.ProcessEnv;
  cwd?: string;
}

/**
 * Loads and merges the runtime configuration from all layers.
 *
 * Merge order (later wins): defaults -> user-global -> cwd-local -> environment.
 * The merged result is validated against the Zod schema, and runtime CLI flags
 * are applied as final overrides.
 *
 * @throws ConfigError if a config file holds invalid JSON or the result fails validation.
 */
export async function loadRuntimeConfig(
  flags: RuntimeFlags = {},
  options: LoadRuntimeConfigOptions = {},
): Promise<RuntimeConfig> {
  const sources = resolveConfigSources(flags, options.cwd);

  // Load order: defaults → ~/.tabrelay/ (or --config) → ./.tabrelay/ → TABRELAY_*
  const userConfig = await readOptionalJson(sources.userConfigPath);
  const cwdConfig = sources.cwdConfigPath !== sources.userConfigPath
    ? await readOptionalJson(sources.cwdConfigPath)
    : undefined;

  let merged = deepMerge({ ...structuredClone(DEFAULT_CONFIG) }, userConfig);
  merged = deepMerge(merged, cwdConfig);
  merged = deepMerge(merged, configFromEnv(options.env ?? process.env));

  return applyRuntimeFlags(parseRuntimeConfig(merged), flags);
}
