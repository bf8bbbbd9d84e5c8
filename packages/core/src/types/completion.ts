// packages/core/src/types/completion.ts

export interface HttpFailure {
  type: 'http';
  status: number;
  reason: string;
}

export interface TransportFailure {
  type: 'transport';
  message: string;
}

export interface DecodeFailure {
  type: 'decode';
  message: string;
}

export type CompletionFailure = HttpFailure | TransportFailure | DecodeFailure;

/**
 * Result of one completion request. Failures are values: the interaction loop
 * renders them and moves on, so none of them is thrown.
 */
export type CompletionOutcome =
  | { kind: 'reply'; text: string }
  | { kind: 'empty' }
  | { kind: 'failure'; failure: CompletionFailure };
