// packages/core/src/config/index.ts -- barrel re-export

export { DEFAULT_CONFIG } from './defaults.js';
export { MODELS, DEFAULT_MODEL, isModelName } from './models.js';
export type { ModelName } from './models.js';
export { configFileSchema, validateConfig, toConfigFile } from './schema.js';
export type { ConfigFile } from './schema.js';
export {
  loadConfig,
  writeConfig,
  resolveConfigDir,
  configFilePath,
  sessionFilePath,
} from './loader.js';
export type { LoadConfigOptions } from './loader.js';
