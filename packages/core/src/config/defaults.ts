// packages/core/src/config/defaults.ts

import type { ChatConfig } from '../types/config.js';
import { DEFAULT_BASE_URL } from '../utils/constants.js';
import { DEFAULT_MODEL } from './models.js';

/** Everything but the API key, which has no default. */
export const DEFAULT_CONFIG: Omit<ChatConfig, 'apiKey'> = {
  model: DEFAULT_MODEL,
  baseUrl: DEFAULT_BASE_URL,
  indicator: 'dots',
  logLevel: 'warn',
};
