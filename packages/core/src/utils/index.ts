// packages/core/src/utils/index.ts -- barrel re-export

export { ConfigError, TranscriptError } from './errors.js';
export { createLogger, silentLogger } from './logger.js';
export type { Logger, LogLevel, LogWriter } from './logger.js';
