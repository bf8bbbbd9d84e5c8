// packages/core/src/types/events.ts

import type { CompletionFailure } from './completion.js';

/**
 * Events emitted by the interaction loop and rendered by the CLI.
 * Type names are dot-separated.
 */

// -- Input events --
export interface ResumePromptEvent {
  type: 'prompt.resume';
}

export interface TurnPromptEvent {
  type: 'prompt.turn';
}

/** Non-interactive input, echoed so the output reads as a transcript. */
export interface PipedTurnEvent {
  type: 'turn.piped';
  text: string;
}

// -- Exchange events --
export interface ReplyReceivedEvent {
  type: 'reply.received';
  text: string;
}

export interface ReplyEmptyEvent {
  type: 'reply.empty';
}

export interface ExchangeFailedEvent {
  type: 'exchange.failed';
  failure: CompletionFailure;
  message: string;
}

// -- Session events --
export interface SessionResumedEvent {
  type: 'session.resumed';
  turns: number;
}

export interface SessionSavedEvent {
  type: 'session.saved';
  turns: number;
  path: string;
}

export type ChatEvent =
  | ResumePromptEvent
  | TurnPromptEvent
  | PipedTurnEvent
  | ReplyReceivedEvent
  | ReplyEmptyEvent
  | ExchangeFailedEvent
  | SessionResumedEvent
  | SessionSavedEvent;
