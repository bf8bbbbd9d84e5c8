// packages/cli/src/commands/setup.ts -- Store the API key and default model

import {
  ConfigError,
  DEFAULT_CONFIG,
  isModelName,
  loadConfig,
  resolveConfigDir,
  writeConfig,
} from '@palaver/core';
import type { ChatConfig, ModelName } from '@palaver/core';
import chalk from 'chalk';

import { promptApiKey, selectModel } from '../prompts.js';
import { isInteractive } from '../utils.js';

/**
 * Ask for the key and model, then write config.yml. Settings other than those
 * two are carried over from an existing, valid config file.
 */
export async function runSetup(configDir: string, model?: ModelName): Promise<ChatConfig> {
  let existing: ChatConfig | null = null;
  try {
    existing = loadConfig({ configDir, env: {} });
  } catch (err) {
    if (!(err instanceof ConfigError)) throw err;
    console.error(chalk.yellow(`Replacing invalid configuration (${err.message})`));
  }

  const apiKey = await promptApiKey();
  const current = existing && isModelName(existing.model) ? existing.model : undefined;
  const chosen = model ?? (await selectModel(current));

  const config: ChatConfig = {
    ...DEFAULT_CONFIG,
    ...existing,
    apiKey,
    model: chosen,
  };
  const path = writeConfig(config, configDir);
  console.error(chalk.green(`Saved configuration to ${path}`));
  return config;
}

export async function setupCommand(): Promise<void> {
  if (!isInteractive(false)) {
    throw new ConfigError('Setup needs an interactive terminal.');
  }
  await runSetup(resolveConfigDir());
}
