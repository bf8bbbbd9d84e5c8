// packages/core/src/config/loader.ts

import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { homedir } from 'node:os';
import { join } from 'node:path';
import { parse as parseYaml, stringify as stringifyYaml } from 'yaml';
import type { ChatConfig } from '../types/config.js';
import {
  APP_DIR_NAME,
  CONFIG_DIR_ENV,
  CONFIG_FILENAME,
  SESSION_FILENAME,
} from '../utils/constants.js';
import { ConfigError } from '../utils/errors.js';
import { DEFAULT_CONFIG } from './defaults.js';
import { toConfigFile, validateConfig } from './schema.js';

/** Env vars that override single config.yml keys. */
const ENV_OVERRIDES: Record<string, string> = {
  PALAVER_API_KEY: 'api_key',
  PALAVER_MODEL: 'model',
  PALAVER_BASE_URL: 'base_url',
};

export interface LoadConfigOptions {
  configDir?: string;
  env?: NodeJS.ProcessEnv;
  overrides?: Partial<ChatConfig>;
}

/** ~/.config/palaver, unless PALAVER_CONFIG_DIR says otherwise. */
export function resolveConfigDir(env: NodeJS.ProcessEnv = process.env): string {
  return env[CONFIG_DIR_ENV] || join(homedir(), '.config', APP_DIR_NAME);
}

export function configFilePath(dir: string): string {
  return join(dir, CONFIG_FILENAME);
}

export function sessionFilePath(dir: string): string {
  return join(dir, SESSION_FILENAME);
}

function readConfigFile(path: string): Record<string, unknown> {
  let parsed: unknown;
  try {
    parsed = parseYaml(readFileSync(path, 'utf-8'));
  } catch (err) {
    throw new ConfigError(
      `Failed to parse ${path}: ${err instanceof Error ? err.message : String(err)}`,
    );
  }
  if (parsed === null || parsed === undefined) return {};
  if (typeof parsed !== 'object' || Array.isArray(parsed)) {
    throw new ConfigError(`Failed to parse ${path}: expected a mapping of keys to values`);
  }
  return { ...parsed };
}

/**
 * Load config with precedence: overrides > env > config.yml > defaults.
 *
 * Returns null when no API key is configured anywhere, which callers treat as
 * a first run. Any other problem throws ConfigError.
 */
export function loadConfig(options?: LoadConfigOptions): ChatConfig | null {
  const env = options?.env ?? process.env;
  const dir = options?.configDir ?? resolveConfigDir(env);
  const path = configFilePath(dir);

  const defaults: Record<string, unknown> = {
    model: DEFAULT_CONFIG.model,
    base_url: DEFAULT_CONFIG.baseUrl,
    indicator: DEFAULT_CONFIG.indicator,
    log_level: DEFAULT_CONFIG.logLevel,
  };
  const fromFile = existsSync(path) ? readConfigFile(path) : {};

  const fromEnv: Record<string, unknown> = {};
  for (const [name, key] of Object.entries(ENV_OVERRIDES)) {
    const value = env[name];
    if (value) fromEnv[key] = value;
  }

  const fromOverrides: Record<string, unknown> = {};
  const overrides = options?.overrides;
  if (overrides?.apiKey !== undefined) fromOverrides.api_key = overrides.apiKey;
  if (overrides?.model !== undefined) fromOverrides.model = overrides.model;
  if (overrides?.baseUrl !== undefined) fromOverrides.base_url = overrides.baseUrl;
  if (overrides?.indicator !== undefined) fromOverrides.indicator = overrides.indicator;
  if (overrides?.logLevel !== undefined) fromOverrides.log_level = overrides.logLevel;

  const merged = { ...defaults, ...fromFile, ...fromEnv, ...fromOverrides };
  if (merged.api_key === undefined) return null;

  return validateConfig(merged);
}

/**
 * Write config.yml into `dir`, creating the directory. The file holds the API
 * key, so it is readable by the owner only.
 */
export function writeConfig(config: ChatConfig, dir: string): string {
  const path = configFilePath(dir);
  mkdirSync(dir, { recursive: true });
  writeFileSync(path, stringifyYaml(toConfigFile(config)), { encoding: 'utf-8', mode: 0o600 });
  return path;
}
