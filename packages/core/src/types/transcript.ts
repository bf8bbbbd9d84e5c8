// packages/core/src/types/transcript.ts

export type TurnRole = 'user' | 'assistant';

/** One message of a conversation. Never mutated once created. */
export interface Turn {
  readonly role: TurnRole;
  readonly content: string;
}

/** Turns in conversation order. Append-only: new transcripts are built by copying. */
export type Transcript = readonly Turn[];
