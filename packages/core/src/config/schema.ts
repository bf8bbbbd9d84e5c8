// packages/core/src/config/schema.ts

import { z } from 'zod';
import type { ChatConfig } from '../types/config.js';
import { ConfigError } from '../utils/errors.js';
import { MODELS } from './models.js';

/**
 * On-disk shape of config.yml. Keys are snake_case so the file stays
 * compatible with `{ api_key, model }` records written by earlier setups.
 */
export const configFileSchema = z.object({
  api_key: z.string().min(1, 'API key must not be empty'),
  model: z.enum(MODELS),
  base_url: z.string().url(),
  indicator: z.enum(['dots', 'spinner']),
  log_level: z.enum(['debug', 'info', 'warn', 'error']),
});

export type ConfigFile = z.infer<typeof configFileSchema>;

/**
 * Validate a merged raw config record. Throws ConfigError naming the first
 * offending field.
 */
export function validateConfig(raw: unknown): ChatConfig {
  const result = configFileSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    const field = result.error.issues[0]?.path.join('.');
    throw new ConfigError(`Invalid configuration: ${issues}`, field);
  }
  const data = result.data;
  return {
    apiKey: data.api_key,
    model: data.model,
    baseUrl: data.base_url,
    indicator: data.indicator,
    logLevel: data.log_level,
  };
}

export function toConfigFile(config: ChatConfig): Record<string, string> {
  return {
    api_key: config.apiKey,
    model: config.model,
    base_url: config.baseUrl,
    indicator: config.indicator,
    log_level: config.logLevel,
  };
}
