// packages/core/src/types/config.ts

import type { LogLevel } from '../utils/logger.js';

export type IndicatorStyle = 'dots' | 'spinner';

export interface ChatConfig {
  apiKey: string;
  model: string;
  baseUrl: string;
  indicator: IndicatorStyle;
  logLevel: LogLevel;
}
