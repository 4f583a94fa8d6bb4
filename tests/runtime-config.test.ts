import { mkdir, writeFile } from 'node:fs/promises';
import { dirname, join } from 'node:path';
import { describe, expect, test } from 'vitest';
import {
  DEFAULT_CONFIG,
  configFromEnv,
  loadRuntimeConfig,
  parseRuntimeConfig,
  resolveConfigSources,
} from '../src/core/config/runtime-config.js';
import { ConfigError } from '../src/core/errors.js';
import { withTempDir } from './helpers.js';

async function writeJson(path: string, value: unknown): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, JSON.stringify(value, null, 2));
}

describe('Runtime config loading', () => {
  test('falls back to defaults when no layer is present', async () => {
    await withTempDir(async (dir) => {
      const config = await loadRuntimeConfig(
        { configPath: join(dir, 'missing.json') },
        { cwd: dir, env: {} },
      );
      expect(config).toEqual(DEFAULT_CONFIG);
    });
  });

  test('later layers win: user file, cwd file, environment, flags', async () => {
    await withTempDir(async (dir) => {
      const userConfigPath = join(dir, 'user.json');
      await writeJson(userConfigPath, {
        gateway: { port: 9001 },
        tasks: { untargetedKill: 'ignore' },
        agent: { options: { stepDelayMs: 5 } },
      });
      await writeJson(join(dir, '.tabrelay', 'config.json'), {
        gateway: { port: 9002, bindRetries: 2 },
      });

      const config = await loadRuntimeConfig(
        { configPath: userConfigPath, port: 9100 },
        { cwd: dir, env: { TABRELAY_HOST: '0.0.0.0', TABRELAY_INTERVENTION_TIMEOUT_MS: '60000' } },
      );

      expect(config.gateway).toEqual({ host: '0.0.0.0', port: 9100, bindRetries: 2, bindBackoffMs: 1_000 });
      expect(config.tasks.untargetedKill).toBe('ignore');
      expect(config.tasks.cancelGraceMs).toBe(10_000);
      expect(config.intervention.timeoutMs).toBe(60_000);
      expect(config.agent).toEqual({ driver: 'dry-run', options: { stepDelayMs: 5 } });
    });
  });

  test('flags override driver and log level', async () => {
    await withTempDir(async (dir) => {
      const config = await loadRuntimeConfig(
        { configPath: join(dir, 'missing.json'), driver: './drivers/custom.mjs', logLevel: 'debug' },
        { cwd: dir, env: { TABRELAY_DRIVER: './ignored.mjs', TABRELAY_LOG_LEVEL: 'warn' } },
      );
      expect(config.agent.driver).toBe('./drivers/custom.mjs');
      expect(config.logging.level).toBe('debug');
    });
  });

  test('rejects malformed JSON with a ConfigError naming the file', async () => {
    await withTempDir(async (dir) => {
      const userConfigPath = join(dir, 'broken.json');
      await writeFile(userConfigPath, '{ "gateway": ');

      const load = loadRuntimeConfig({ configPath: userConfigPath }, { cwd: dir, env: {} });
      await expect(load).rejects.toBeInstanceOf(ConfigError);
      await expect(load).rejects.toThrow(`Invalid JSON in ${userConfigPath}`);
    });
  });

  test('rejects a config root that is not an object', async () => {
    await withTempDir(async (dir) => {
      const userConfigPath = join(dir, 'array.json');
      await writeJson(userConfigPath, [1, 2, 3]);

      await expect(
        loadRuntimeConfig({ configPath: userConfigPath }, { cwd: dir, env: {} }),
      ).rejects.toThrow(`Config root must be an object: ${userConfigPath}`);
    });
  });

  test('rejects unknown keys and out-of-range values', async () => {
    await withTempDir(async (dir) => {
      const userConfigPath = join(dir, 'user.json');
      await writeJson(userConfigPath, { gateway: { port: 70_000 }, extras: true });

      const load = loadRuntimeConfig({ configPath: userConfigPath }, { cwd: dir, env: {} });
      await expect(load).rejects.toBeInstanceOf(ConfigError);
      await expect(load).rejects.toThrow(/^Invalid runtime config: /);
    });
  });

  test('a non-numeric port from the environment fails validation', async () => {
    await withTempDir(async (dir) => {
      await expect(
        loadRuntimeConfig({ configPath: join(dir, 'missing.json') }, { cwd: dir, env: { TABRELAY_PORT: 'http' } }),
      ).rejects.toThrow(/gateway\.port/);
    });
  });
});

describe('Runtime config helpers', () => {
  test('resolveConfigSources prefers an explicit config path', () => {
    const sources = resolveConfigSources({ configPath: '/etc/tabrelay.json' }, '/work/project');
    expect(sources).toEqual({
      userConfigPath: '/etc/tabrelay.json',
      cwdConfigPath: join('/work/project', '.tabrelay', 'config.json'),
    });
  });

  test('configFromEnv leaves unset variables undefined', () => {
    expect(configFromEnv({ TABRELAY_PORT: '9000', TABRELAY_UNTARGETED_KILL: 'ignore' })).toEqual({
      gateway: { host: undefined, port: 9000 },
      tasks: { untargetedKill: 'ignore' },
      intervention: { timeoutMs: undefined },
      agent: { driver: undefined },
      logging: { level: undefined },
    });
  });

  test('parseRuntimeConfig reports every issue at once', () => {
    const input = structuredClone(DEFAULT_CONFIG);
    const broken = { ...input, tasks: { ...input.tasks, untargetedKill: 'everything', cancelGraceMs: -1 } };

    expect(() => parseRuntimeConfig(broken)).toThrow(ConfigError);
    try {
      parseRuntimeConfig(broken);
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigError);
      const message = error instanceof Error ? error.message : '';
      expect(message).toContain('tasks.untargetedKill');
      expect(message).toContain('tasks.cancelGraceMs');
    }
  });
});
