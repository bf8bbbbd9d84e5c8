// packages/core/src/utils/constants.ts -- Shared constants

/** Default chat completions host */
export const DEFAULT_BASE_URL = 'https://api.poe.com';

/** Chat completions endpoint, relative to the base URL */
export const CHAT_COMPLETIONS_PATH = '/v1/chat/completions';

/** Length of a provider API key */
export const API_KEY_LENGTH = 43;

/** Delay between progress dots in milliseconds */
export const PROGRESS_TICK_MS = 500;

/** Directory name under ~/.config */
export const APP_DIR_NAME = 'palaver';

export const CONFIG_FILENAME = 'config.yml';

export const SESSION_FILENAME = 'session.json';

/** Relocates both the config and the session file */
export const CONFIG_DIR_ENV = 'PALAVER_CONFIG_DIR';
