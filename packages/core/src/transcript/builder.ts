// packages/core/src/transcript/builder.ts

import type { Transcript, Turn, TurnRole } from '../types/transcript.js';
import { TranscriptError } from '../utils/errors.js';

function append(transcript: Transcript, role: TurnRole, content: string): Transcript {
  const turn: Turn = Object.freeze({ role, content });
  return Object.freeze([...transcript, turn]);
}

/**
 * Return a copy of `transcript` ending with a new user turn.
 *
 * Blank input is the caller's signal to stop the conversation, so it is
 * rejected here rather than sent.
 */
export function appendUserTurn(transcript: Transcript, text: string): Transcript {
  if (text.trim() === '') {
    throw new TranscriptError('Cannot append a blank user turn');
  }
  return append(transcript, 'user', text);
}

/** Return a copy of `transcript` ending with the assistant's reply. */
export function appendAssistantTurn(transcript: Transcript, text: string): Transcript {
  return append(transcript, 'assistant', text);
}
