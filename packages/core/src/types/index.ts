// packages/core/src/types/index.ts -- barrel re-export

export type { TurnRole, Turn, Transcript } from './transcript.js';

export type {
  HttpFailure,
  TransportFailure,
  DecodeFailure,
  CompletionFailure,
  CompletionOutcome,
} from './completion.js';

export type { IndicatorStyle, ChatConfig } from './config.js';

export type {
  ResumePromptEvent,
  TurnPromptEvent,
  PipedTurnEvent,
  ReplyReceivedEvent,
  ReplyEmptyEvent,
  ExchangeFailedEvent,
  SessionResumedEvent,
  SessionSavedEvent,
  ChatEvent,
} from './events.js';
