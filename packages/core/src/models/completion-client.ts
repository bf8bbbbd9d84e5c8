// packages/core/src/models/completion-client.ts -- One-shot chat completions over HTTPS

import { STATUS_CODES } from 'node:http';
import { z } from 'zod';
import type { CompletionFailure, CompletionOutcome } from '../types/completion.js';
import type { Transcript } from '../types/transcript.js';
import { CHAT_COMPLETIONS_PATH, DEFAULT_BASE_URL } from '../utils/constants.js';
import { TranscriptError } from '../utils/errors.js';
import type { Logger } from '../utils/logger.js';
import { silentLogger } from '../utils/logger.js';

export type FetchLike = (input: URL, init: RequestInit) => Promise<Response>;

/** What the interaction loop needs from a completion backend. */
export interface Completer {
  complete(transcript: Transcript, model: string): Promise<CompletionOutcome>;
}

export interface CompletionClientOptions {
  apiKey: string;
  baseUrl?: string;
  /** Defaults to the global fetch. */
  fetch?: FetchLike;
  logger?: Logger;
}

// Unknown fields are kept out of the way, not rejected.
const completionSchema = z
  .object({
    choices: z
      .array(
        z
          .object({
            message: z.object({ content: z.string().nullish() }).passthrough(),
          })
          .passthrough(),
      )
      .nullish(),
  })
  .passthrough();

export class CompletionClient implements Completer {
  private readonly endpoint: URL;
  private readonly fetchImpl: FetchLike;
  private readonly logger: Logger;

  constructor(private options: CompletionClientOptions) {
    this.endpoint = new URL(CHAT_COMPLETIONS_PATH, options.baseUrl ?? DEFAULT_BASE_URL);
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Send the whole transcript and wait for the full reply. Makes exactly one
   * attempt; every failure comes back as a `failure` outcome.
   */
  async complete(transcript: Transcript, model: string): Promise<CompletionOutcome> {
    if (transcript.length === 0) {
      throw new TranscriptError('Refusing to send an empty transcript');
    }

    const body = JSON.stringify({ model, messages: transcript, stream: false });
    this.logger.debug(`POST ${this.endpoint.href} model=${model} turns=${transcript.length}`);

    let response: Response;
    try {
      response = await this.fetchImpl(this.endpoint, {
        method: 'POST',
        headers: {
          Authorization: `Bearer ${this.options.apiKey}`,
          'Content-Type': 'application/json',
        },
        body,
      });
    } catch (err) {
      return fail({ type: 'transport', message: describeError(err) });
    }

    this.logger.debug(`Response ${response.status} from ${this.endpoint.host}`);

    if (response.status !== 200) {
      const detail = await response.text().catch((err: unknown) => `<unreadable: ${describeError(err)}>`);
      this.logger.debug(`Error body: ${detail.slice(0, 500)}`);
      return fail({
        type: 'http',
        status: response.status,
        reason: response.statusText || STATUS_CODES[response.status] || 'Unknown Status',
      });
    }

    let raw: string;
    try {
      raw = await response.text();
    } catch (err) {
      return fail({ type: 'transport', message: describeError(err) });
    }
    return parseCompletion(raw);
  }
}

/**
 * Turn a 200 response body into an outcome. The reply is every choice's
 * message content, concatenated in order; a missing content counts as empty.
 */
export function parseCompletion(raw: string): CompletionOutcome {
  let body: unknown;
  try {
    body = JSON.parse(raw);
  } catch (err) {
    return fail({ type: 'decode', message: `body is not JSON (${describeError(err)})` });
  }

  const result = completionSchema.safeParse(body);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join('.') || '<root>'}: ${i.message}`).join('; ');
    return fail({ type: 'decode', message: issues });
  }

  const choices = result.data.choices ?? [];
  if (choices.length === 0) return { kind: 'empty' };

  return { kind: 'reply', text: choices.map((choice) => choice.message.content ?? '').join('') };
}

/** One-line, human-readable description of a failure. */
export function describeFailure(failure: CompletionFailure): string {
  switch (failure.type) {
    case 'http':
      return `${failure.status} ${failure.reason}`;
    case 'transport':
      return `connection failed: ${failure.message}`;
    case 'decode':
      return `invalid response: ${failure.message}`;
  }
}

function fail(failure: CompletionFailure): CompletionOutcome {
  return { kind: 'failure', failure };
}

// fetch() reports network errors as "fetch failed" with the real reason in `cause`.
function describeError(err: unknown): string {
  if (!(err instanceof Error)) return String(err);
  if (err.cause instanceof Error && err.cause.message) {
    return `${err.message}: ${err.cause.message}`;
  }
  return err.message;
}
