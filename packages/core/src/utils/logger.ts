// packages/core/src/utils/logger.ts

/** Ordered from most to least verbose. */
export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export type LogWriter = (prefix: string, message: string, ...args: unknown[]) => void;

export type Logger = Record<LogLevel, (message: string, ...args: unknown[]) => void>;

// stdout carries the conversation and may be piped into another program.
const toStderr: LogWriter = (...parts) => console.error(...parts);

/**
 * Levelled logger. Lines below `level` are dropped; the rest go to `write`
 * with an ISO timestamp and the level name.
 */
export function createLogger(level: LogLevel = 'warn', write: LogWriter = toStderr): Logger {
  const threshold = LOG_LEVELS.indexOf(level);

  const at =
    (lineLevel: LogLevel) =>
    (message: string, ...args: unknown[]): void => {
      if (LOG_LEVELS.indexOf(lineLevel) < threshold) return;
      write(`[${new Date().toISOString()}] ${lineLevel.toUpperCase()}:`, message, ...args);
    };

  return { debug: at('debug'), info: at('info'), warn: at('warn'), error: at('error') };
}

const drop = (): void => {};

/** Logger that drops everything. Used when a caller passes none. */
export const silentLogger: Logger = { debug: drop, info: drop, warn: drop, error: drop };
