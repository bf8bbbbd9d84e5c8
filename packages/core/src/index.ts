// @palaver/core - conversation loop, completion client and session storage

export const VERSION = '0.1.0';

// Type definitions
export type {
  // Transcript
  TurnRole,
  Turn,
  Transcript,
  // Completion
  HttpFailure,
  TransportFailure,
  DecodeFailure,
  CompletionFailure,
  CompletionOutcome,
  // Config
  IndicatorStyle,
  ChatConfig,
  // Events
  ResumePromptEvent,
  TurnPromptEvent,
  PipedTurnEvent,
  ReplyReceivedEvent,
  ReplyEmptyEvent,
  ExchangeFailedEvent,
  SessionResumedEvent,
  SessionSavedEvent,
  ChatEvent,
} from './types/index.js';

// Utilities
export { ConfigError, TranscriptError, createLogger, silentLogger } from './utils/index.js';
export type { Logger, LogLevel, LogWriter } from './utils/index.js';
export {
  API_KEY_LENGTH,
  CHAT_COMPLETIONS_PATH,
  DEFAULT_BASE_URL,
  PROGRESS_TICK_MS,
} from './utils/constants.js';

// Configuration
export {
  DEFAULT_CONFIG,
  MODELS,
  DEFAULT_MODEL,
  isModelName,
  configFileSchema,
  validateConfig,
  loadConfig,
  writeConfig,
  resolveConfigDir,
  configFilePath,
  sessionFilePath,
} from './config/index.js';
export type { ModelName, ConfigFile, LoadConfigOptions } from './config/index.js';

// Transcript
export { appendUserTurn, appendAssistantTurn } from './transcript/index.js';

// Session storage
export { SessionStore } from './memory/index.js';
export type { TranscriptStore } from './memory/index.js';

// Completion client
export { CompletionClient, parseCompletion, describeFailure } from './models/index.js';
export type { Completer, CompletionClientOptions, FetchLike } from './models/index.js';

// Engine
export {
  EventBus,
  CancellationToken,
  DotsIndicator,
  createLineSource,
  collectTurn,
  collectAll,
  ChatLoop,
} from './engine/index.js';
export type {
  DotsIndicatorOptions,
  ProgressHandle,
  ProgressIndicator,
  TextSink,
  LineSource,
  ChatLoopDeps,
  ChatLoopOptions,
  ChatRunResult,
  LoopState,
} from './engine/index.js';
