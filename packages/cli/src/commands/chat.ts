// packages/cli/src/commands/chat.ts -- Interactive or piped conversation

import {
  ChatLoop,
  CompletionClient,
  ConfigError,
  EventBus,
  SessionStore,
  createLineSource,
  createLogger,
  isModelName,
  loadConfig,
  resolveConfigDir,
  sessionFilePath,
} from '@palaver/core';

import { createIndicator, createRenderer, printWelcome } from '../render.js';
import { isInteractive } from '../utils.js';
import { runSetup } from './setup.js';

export type ChatOptions = {
  continue?: boolean;
  interactive?: boolean;
  model?: string;
  verbose?: boolean;
};

export async function chatCommand(options: ChatOptions): Promise<void> {
  const interactive = isInteractive(options.interactive);
  const configDir = resolveConfigDir();
  const model = options.model !== undefined && isModelName(options.model) ? options.model : undefined;

  let config = loadConfig({ configDir, overrides: model ? { model } : undefined });
  if (!config) {
    if (!interactive) {
      throw new ConfigError(
        'No API key configured. Run "palaver setup" in a terminal or set PALAVER_API_KEY.',
        'api_key',
      );
    }
    config = await runSetup(configDir, model);
  }

  const logger = createLogger(options.verbose ? 'debug' : config.logLevel);
  logger.debug(`Using model ${config.model} at ${config.baseUrl}`);

  const bus = new EventBus();
  bus.on('event', createRenderer());

  const input = createLineSource(process.stdin);
  if (interactive) printWelcome();

  const loop = new ChatLoop(
    {
      client: new CompletionClient({ apiKey: config.apiKey, baseUrl: config.baseUrl, logger }),
      store: new SessionStore(sessionFilePath(configDir), logger),
      input,
      bus,
      indicator: interactive ? createIndicator(config.indicator) : undefined,
      logger,
    },
    { model: config.model, resume: options.continue === true, interactive },
  );

  try {
    const result = await loop.run();
    logger.debug(`Chat ended after ${result.exchanges} exchange(s), ${result.transcript.length} turn(s)`);
  } finally {
    input.close();
  }
}
