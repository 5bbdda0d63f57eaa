/**
 * @module runtime-config
 *
 * Loads, validates, and merges the taskdeck runtime configuration from its
 * layers (user-global, workspace-local) using a deep-merge strategy. The
 * merged document is validated against a strict Zod schema, then CLI flags
 * and the environment are applied as final overrides.
 *
 * Key exports:
 * - {@link loadRuntimeConfig} - Main entry point to load and merge config
 * - {@link defaultRuntimeConfig} - Defaults for a workspace, before any layer
 * - {@link saveRuntimeConfig} - Persist a RuntimeConfig to disk
 */
import { promises as fs } from 'node:fs';
import { dirname, join, resolve } from 'node:path';
import { homedir } from 'node:os';
import { z } from 'zod';
import type { RuntimeConfig, RuntimeFlags } from '../kernel/contracts.js';
import { ConfigError, errorMessage } from '../../errors.js';

const RuntimeConfigSchema: z.ZodType<RuntimeConfig, z.ZodTypeDef, unknown> = z.object({
  gateway: z.object({
    host: z.string().min(1),
    port: z.number().int().min(0).max(65_535),
    authToken: z.string(),
  }).strict(),
  scheduler: z.object({
    maxConcurrentTasks: z.number().int().positive(),
    taskTimeoutMs: z.number().int().positive(),
    maxAttempts: z.number().int().positive(),
    retryBackoffMs: z.number().int().nonnegative(),
    implicitThreads: z.boolean(),
  }).strict(),
  packages: z.object({
    installTimeoutMs: z.number().int().positive(),
    registryUrl: z.string().url(),
    downloadsUrl: z.string().url(),
    lookupTimeoutMs: z.number().int().positive(),
    installDir: z.string().min(1),
  }).strict(),
  broadcaster: z.object({
    agentsIntervalMs: z.number().int().positive(),
    heartbeatMs: z.number().int().positive(),
  }).strict(),
  storage: z.object({
    dir: z.string().min(1).nullable(),
  }).strict(),
  logging: z.object({
    level: z.enum(['debug', 'info', 'warn', 'error']),
  }).strict(),
}).strict();

/** Resolved file paths for the configuration layers. */
export interface ConfigSources {
  /** User-global config (default: ~/.taskdeck/config.json, or `--config`). */
  userConfigPath: string;
  /** Workspace-scoped config (.taskdeck/config.json under the workspace root). */
  workspaceConfigPath: string;
}

export const GATEWAY_TOKEN_ENV = 'TASKDECK_GATEWAY_TOKEN';

export function defaultRuntimeConfig(workspaceRoot: string): RuntimeConfig {
  return {
    gateway: {
      host: '127.0.0.1',
      port: 7700,
      authToken: ''
    },
    scheduler: {
      maxConcurrentTasks: 4,
      taskTimeoutMs: 120_000,
      maxAttempts: 3,
      retryBackoffMs: 500,
      implicitThreads: false
    },
    packages: {
      installTimeoutMs: 300_000,
      registryUrl: 'https://registry.npmjs.org',
      downloadsUrl: 'https://api.npmjs.org/downloads/point/last-month',
      lookupTimeoutMs: 10_000,
      installDir: join(workspaceRoot, '.taskdeck', 'sandbox')
    },
    broadcaster: {
      agentsIntervalMs: 2_000,
      heartbeatMs: 30_000
    },
    storage: {
      dir: join(workspaceRoot, '.taskdeck', 'state')
    },
    logging: {
      level: 'info'
    }
  };
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Objects merge key by key; arrays and scalars from `override` replace. */
export function deepMerge(base: object, override: Record<string, unknown> | undefined): Record<string, unknown> {
  const output: Record<string, unknown> = { ...base };
  if (!override) {
    return output;
  }

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

async function readOptionalJson(path: string): Promise<Record<string, unknown> | undefined> {
  let raw: string;
  try {
    raw = await fs.readFile(path, 'utf8');
  } catch (error) {
    if (isPlainObject(error) && error.code === 'ENOENT') {
      return undefined;
    }
    throw new ConfigError(`Cannot read config ${path}: ${errorMessage(error)}`);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new ConfigError(`Invalid JSON in ${path}: ${errorMessage(error)}`);
  }
  if (!isPlainObject(parsed)) {
    throw new ConfigError(`Config root must be an object: ${path}`);
  }
  return parsed;
}

export function resolveConfigSources(workspaceRoot: string, flags: RuntimeFlags): ConfigSources {
  return {
    userConfigPath: flags.configPath ?? join(homedir(), '.taskdeck', 'config.json'),
    workspaceConfigPath: resolve(workspaceRoot, '.taskdeck', 'config.json')
  };
}

function applyRuntimeFlags(config: RuntimeConfig, flags: RuntimeFlags, env: NodeJS.ProcessEnv): RuntimeConfig {
  const next = structuredClone(config);

  const envToken = env[GATEWAY_TOKEN_ENV];
  if (envToken) {
    next.gateway.authToken = envToken;
  }
  if (flags.gatewayToken) {
    next.gateway.authToken = flags.gatewayToken;
  }
  if (flags.gatewayHost) {
    next.gateway.host = flags.gatewayHost;
  }
  if (flags.gatewayPort !== undefined) {
    next.gateway.port = flags.gatewayPort;
  }

  return next;
}

export function parseRuntimeConfig(value: unknown): RuntimeConfig {
  const result = RuntimeConfigSchema.safeParse(value);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid configuration: ${issues}`);
  }
  return result.data;
}

/**
 * Persists a RuntimeConfig as formatted JSON. Uses atomic write (tmp + rename)
 * to prevent partial writes.
 */
export async function saveRuntimeConfig(config: RuntimeConfig, configPath: string): Promise<void> {
  await fs.mkdir(dirname(configPath), { recursive: true });
  const tmpPath = `${configPath}.tmp`;
  await fs.writeFile(tmpPath, `${JSON.stringify(config, null, 2)}\n`, 'utf8');
  await fs.rename(tmpPath, configPath);
}

/**
 * Loads and merges the runtime configuration from all layers.
 *
 * Merge order (later wins): defaults -> user-global -> workspace-local -> env -> flags.
 *
 * @throws ConfigError if a layer holds invalid JSON or the result fails validation.
 */
export async function loadRuntimeConfig(
  workspaceRoot: string,
  flags: RuntimeFlags = {},
  env: NodeJS.ProcessEnv = process.env
): Promise<RuntimeConfig> {
  const sources = resolveConfigSources(workspaceRoot, flags);

  const userConfig = await readOptionalJson(sources.userConfigPath);
  const workspaceConfig = sources.workspaceConfigPath !== sources.userConfigPath
    ? await readOptionalJson(sources.workspaceConfigPath)
    : undefined;

  let merged = deepMerge(defaultRuntimeConfig(workspaceRoot), userConfig);
  merged = deepMerge(merged, workspaceConfig);

  return applyRuntimeFlags(parseRuntimeConfig(merged), flags, env);
}
