import { ConfigError, MODELS, loadConfig } from '@palaver/core';
import chalk from 'chalk';

export async function modelsCommand(): Promise<void> {
  let current: string | undefined;
  try {
    current = loadConfig()?.model;
  } catch (err) {
    if (!(err instanceof ConfigError)) throw err;
    console.error(chalk.yellow(err.message));
  }

  for (const [index, model] of MODELS.entries()) {
    const marker = model === current ? chalk.green(' (current)') : '';
    console.log(`${index + 1}: ${model}${marker}`);
  }
}
