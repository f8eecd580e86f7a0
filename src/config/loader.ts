import { randomBytes } from 'node:crypto';
import { readFile } from 'node:fs/promises';

import { parse as parseYaml } from 'yaml';

import { logLevelSchema, serverConfigSchema } from '../schema/config.js';
import type { ServerConfig, ServerConfigInput } from '../schema/config.js';

// ── Public types ────────────────────────────────────────────

export type WorkerConfig = Omit<ServerConfig, 'secretKey'> & {
  secretKey: string;
  /** True when no secret was configured and a random one was made up. */
  secretGenerated: boolean;
};

export interface LoadConfigOptions {
  env?: NodeJS.ProcessEnv;
  /** Optional YAML (or JSON) config file. Env values take precedence. */
  file?: string | undefined;
  /** Highest precedence, e.g. CLI flags. */
  overrides?: ServerConfigInput;
}

// ── Env mapping ─────────────────────────────────────────────

function parseBoolean(name: string, raw: string): boolean {
  const value = raw.trim().toLowerCase();
  if (['1', 'true', 'yes', 'on'].includes(value)) return true;
  if (['0', 'false', 'no', 'off'].includes(value)) return false;
  throw new Error(`${name} must be a boolean (true/false), got "${raw}"`);
}

function parseInteger(name: string, raw: string): number {
  const value = Number(raw);
  if (!Number.isInteger(value)) {
    throw new Error(`${name} must be an integer, got "${raw}"`);
  }
  return value;
}

export function configFromEnv(env: NodeJS.ProcessEnv): ServerConfigInput {
  const config: ServerConfigInput = {};

  const secretKey = env['SECRET_KEY'];
  if (secretKey) config.secretKey = secretKey;

  const host = env['HOST'];
  if (host) config.host = host;

  const port = env['PORT'];
  if (port) config.port = parseInteger('PORT', port);

  const storagePath = env['STORAGE_PATH'];
  if (storagePath) config.storagePath = storagePath;

  const headless = env['HEADLESS'];
  if (headless) config.headless = parseBoolean('HEADLESS', headless);

  const logLevel = env['LOG_LEVEL'];
  if (logLevel) config.logLevel = logLevelSchema.parse(logLevel.trim().toLowerCase());

  const taskTimeout = env['TASK_TIMEOUT_MS'];
  if (taskTimeout) config.taskTimeoutMs = parseInteger('TASK_TIMEOUT_MS', taskTimeout);

  const saveOnShutdown = env['SAVE_STORAGE_ON_SHUTDOWN'];
  if (saveOnShutdown) {
    config.saveStorageOnShutdown = parseBoolean('SAVE_STORAGE_ON_SHUTDOWN', saveOnShutdown);
  }

  return config;
}

// ── File loading ────────────────────────────────────────────

/**
 * Read a YAML or JSON config file. The shape is validated together
 * with env values in `loadConfig`.
 */
export async function loadConfigFile(configPath: string): Promise<unknown> {
  const raw = await readFile(configPath, 'utf-8');

  const parsed: unknown = configPath.endsWith('.json')
    ? JSON.parse(raw)
    : parseYaml(raw);

  return parsed ?? {};
}

// ── Public API ──────────────────────────────────────────────

export function generateSecret(): string {
  return randomBytes(32).toString('base64url');
}

/**
 * Resolve the worker config: file < env < overrides.
 * Throws a ZodError if the merged result is invalid.
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<WorkerConfig> {
  const fromFile = options.file !== undefined
    ? serverConfigSchema.partial().parse(await loadConfigFile(options.file))
    : {};

  const merged: unknown = {
    ...fromFile,
    ...configFromEnv(options.env ?? process.env),
    ...options.overrides,
  };

  const { secretKey, ...rest } = serverConfigSchema.parse(merged);

  return secretKey !== undefined
    ? { ...rest, secretKey, secretGenerated: false }
    : { ...rest, secretKey: generateSecret(), secretGenerated: true };
}
