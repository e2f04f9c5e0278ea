import { ConfigError, parseConfig } from '@labfleet/shared';
import type { Config } from '@labfleet/shared';
import { readFileSync, existsSync } from 'node:fs';
import { resolve } from 'node:path';
import { ZodError } from 'zod';

export const DEFAULT_CONFIG_FILE = 'labfleet.json';

type Section = Record<string, unknown>;

function isSection(value: unknown): value is Section {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readJson(path: string): Section {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (err) {
    throw new ConfigError(`Cannot read config file ${path}: ${err instanceof Error ? err.message : String(err)}`, {
      cause: err,
    });
  }
  if (!isSection(raw)) {
    throw new ConfigError(`Config file ${path} must contain a JSON object`);
  }
  return raw;
}

function section(raw: Section, key: string): Section {
  const value = raw[key];
  return isSection(value) ? { ...value } : {};
}

function integer(env: NodeJS.ProcessEnv, name: string): number | undefined {
  const value = env[name];
  if (value === undefined || value === '') return undefined;
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new ConfigError(`${name} must be an integer, got "${value}"`);
  }
  return parsed;
}

function argv(env: NodeJS.ProcessEnv, name: string): string[] | undefined {
  const value = env[name]?.trim();
  return value ? value.split(/\s+/) : undefined;
}

export function loadConfig(configPath?: string, env: NodeJS.ProcessEnv = process.env): Config {
  let raw: Section = {};

  // 1. Try configPath if provided, else look for labfleet.json in CWD
  if (configPath) {
    const resolved = resolve(configPath);
    if (!existsSync(resolved)) {
      throw new ConfigError(`Config file not found: ${resolved}`);
    }
    raw = readJson(resolved);
  } else {
    const defaultPath = resolve(DEFAULT_CONFIG_FILE);
    if (existsSync(defaultPath)) {
      raw = readJson(defaultPath);
    }
  }

  // 2. Build nested structure, applying env var overrides
  const manifest = section(raw, 'manifest');
  const state = section(raw, 'state');
  const execution = section(raw, 'execution');
  const health = section(raw, 'health');
  const collaborators = section(raw, 'collaborators');

  if (env.LABFLEET_MANIFEST) manifest.path = env.LABFLEET_MANIFEST;
  if (env.LABFLEET_STATE) state.path = env.LABFLEET_STATE;
  if (env.LABFLEET_HEALTH_DB) state.healthDbPath = env.LABFLEET_HEALTH_DB;

  const parallelism = integer(env, 'LABFLEET_PARALLELISM');
  if (parallelism !== undefined) execution.parallelism = parallelism;
  const retryAttempts = integer(env, 'LABFLEET_RETRY_ATTEMPTS');
  if (retryAttempts !== undefined) execution.retryAttempts = retryAttempts;
  const retryDelayMs = integer(env, 'LABFLEET_RETRY_DELAY_MS');
  if (retryDelayMs !== undefined) execution.retryDelayMs = retryDelayMs;

  const provision = argv(env, 'LABFLEET_PROVISION_COMMAND');
  if (provision) collaborators.provision = provision;
  const configure = argv(env, 'LABFLEET_CONFIGURE_COMMAND');
  if (configure) collaborators.configure = configure;
  const identity = argv(env, 'LABFLEET_IDENTITY_COMMAND');
  if (identity) collaborators.identity = identity;

  // 3. Validate with parseConfig (zod) and return typed Config
  try {
    return parseConfig({ manifest, state, execution, health, collaborators });
  } catch (err) {
    if (err instanceof ZodError) {
      const detail = err.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
      throw new ConfigError(`Invalid configuration: ${detail}`, { cause: err });
    }
    throw err;
  }
}
