import { API_KEY_LENGTH, DEFAULT_MODEL, MODELS } from '@palaver/core';
import type { ModelName } from '@palaver/core';

export async function promptApiKey(): Promise<string> {
  const { default: inquirer } = await import('inquirer');

  const { apiKey } = await inquirer.prompt<{ apiKey: string }>([
    {
      type: 'password',
      name: 'apiKey',
      message: 'Enter your API key (no characters will be displayed as you type):',
      validate: (value: string) =>
        value.trim().length === API_KEY_LENGTH ||
        `Invalid API key length. Expected ${API_KEY_LENGTH} characters.`,
    },
  ]);

  return apiKey.trim();
}

export async function selectModel(current?: ModelName): Promise<ModelName> {
  const { default: inquirer } = await import('inquirer');

  const { model } = await inquirer.prompt<{ model: ModelName }>([
    {
      type: 'select',
      name: 'model',
      message: 'Select a model:',
      choices: MODELS.map((name) => ({ name, value: name })),
      default: current ?? DEFAULT_MODEL,
    },
  ]);

  return model;
}
