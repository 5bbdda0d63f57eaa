import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { describe, expect, test } from 'vitest';
import {
  GATEWAY_TOKEN_ENV,
  deepMerge,
  defaultRuntimeConfig,
  loadRuntimeConfig,
  parseRuntimeConfig,
  saveRuntimeConfig,
} from '../src/core/config/runtime-config.js';
import { ConfigError } from '../src/errors.js';
import { withTempDir } from './helpers.js';

async function writeJson(path: string, value: unknown): Promise<void> {
  await mkdir(join(path, '..'), { recursive: true });
  await writeFile(path, JSON.stringify(value, null, 2));
}

describe('deepMerge', () => {
  test('merges objects key by key and replaces scalars and arrays', () => {
    const merged = deepMerge(
      { a: { b: 1, c: 2 }, list: [1, 2], keep: true },
      { a: { c: 3 }, list: [9], skipped: undefined }
    );
    expect(merged).toEqual({ a: { b: 1, c: 3 }, list: [9], keep: true });
  });
});

describe('loadRuntimeConfig', () => {
  test('returns defaults when no layer exists', async () => {
    await withTempDir(async (dir) => {
      const config = await loadRuntimeConfig(dir, { configPath: join(dir, 'missing.json') }, {});
      expect(config).toEqual(defaultRuntimeConfig(dir));
      expect(config.gateway.port).toBe(7700);
      expect(config.storage.dir).toBe(join(dir, '.taskdeck', 'state'));
    });
  });

  test('workspace layer overrides the user layer', async () => {
    await withTempDir(async (dir) => {
      const userPath = join(dir, 'user', 'config.json');
      await writeJson(userPath, { gateway: { port: 8100, host: '0.0.0.0' }, scheduler: { maxAttempts: 5 } });
      await writeJson(join(dir, '.taskdeck', 'config.json'), { gateway: { port: 8200 } });

      const config = await loadRuntimeConfig(dir, { configPath: userPath }, {});
      expect(config.gateway).toEqual({ host: '0.0.0.0', port: 8200, authToken: '' });
      expect(config.scheduler.maxAttempts).toBe(5);
    });
  });

  test('environment token then flags apply last', async () => {
    await withTempDir(async (dir) => {
      const configPath = join(dir, 'none.json');
      const fromEnv = await loadRuntimeConfig(dir, { configPath }, { [GATEWAY_TOKEN_ENV]: 'env-token' });
      expect(fromEnv.gateway.authToken).toBe('env-token');

      const fromFlags = await loadRuntimeConfig(
        dir,
        { configPath, gatewayToken: 'flag-token', gatewayPort: 0, gatewayHost: 'localhost' },
        { [GATEWAY_TOKEN_ENV]: 'env-token' }
      );
      expect(fromFlags.gateway).toEqual({ host: 'localhost', port: 0, authToken: 'flag-token' });
    });
  });

  test('invalid JSON is a ConfigError', async () => {
    await withTempDir(async (dir) => {
      const configPath = join(dir, 'broken.json');
      await writeFile(configPath, '{ not json');
      await expect(loadRuntimeConfig(dir, { configPath }, {})).rejects.toBeInstanceOf(ConfigError);
    });
  });

  test('schema violations name the offending path', async () => {
    await withTempDir(async (dir) => {
      const configPath = join(dir, 'bad.json');
      await writeJson(configPath, { scheduler: { maxConcurrentTasks: 0 } });
      await expect(loadRuntimeConfig(dir, { configPath }, {})).rejects.toThrow(
        /^Invalid configuration: scheduler\.maxConcurrentTasks: /
      );
    });
  });
});

describe('parseRuntimeConfig', () => {
  test('rejects unknown keys', () => {
    const value = { ...defaultRuntimeConfig('/tmp/ws'), extra: true };
    expect(() => parseRuntimeConfig(value)).toThrow(ConfigError);
  });
});

describe('saveRuntimeConfig', () => {
  test('writes formatted JSON that loads back', async () => {
    await withTempDir(async (dir) => {
      const config = defaultRuntimeConfig(dir);
      config.gateway.port = 9000;
      const configPath = join(dir, 'nested', 'config.json');
      await saveRuntimeConfig(config, configPath);

      const raw = await readFile(configPath, 'utf8');
      expect(raw.endsWith('\n')).toBe(true);
      expect(parseRuntimeConfig(JSON.parse(raw))).toEqual(config);
    });
  });
});
