// packages/core/src/engine/chat-loop.ts -- Read a turn, send it, render the outcome, persist, repeat

import type { TranscriptStore } from '../memory/session-store.js';
import type { Completer } from '../models/completion-client.js';
import { describeFailure } from '../models/completion-client.js';
import { appendAssistantTurn, appendUserTurn } from '../transcript/builder.js';
import type { CompletionOutcome } from '../types/completion.js';
import type { Transcript } from '../types/transcript.js';
import type { Logger } from '../utils/logger.js';
import { silentLogger } from '../utils/logger.js';
import type { EventBus } from './event-bus.js';
import { collectAll, collectTurn } from './line-source.js';
import type { LineSource } from './line-source.js';
import type { ProgressIndicator } from './progress-indicator.js';

export type LoopState = 'awaiting-input' | 'sending' | 'rendering' | 'terminated';

export interface ChatLoopOptions {
  model: string;
  /** Load the saved session without asking. */
  resume: boolean;
  /**
   * Interactive runs prompt, show progress and keep going until a blank turn.
   * Non-interactive runs read all input as one turn and stop after it.
   */
  interactive: boolean;
}

export interface ChatLoopDeps {
  client: Completer;
  store: TranscriptStore;
  input: LineSource;
  bus: EventBus;
  /** Only started in interactive runs. */
  indicator?: ProgressIndicator;
  logger?: Logger;
}

export interface ChatRunResult {
  exchanges: number;
  transcript: Transcript;
}

export class ChatLoop {
  private state: LoopState = 'awaiting-input';
  private transcript: Transcript = [];
  private readonly logger: Logger;

  constructor(
    private deps: ChatLoopDeps,
    private options: ChatLoopOptions,
  ) {
    this.logger = deps.logger ?? silentLogger;
  }

  get currentState(): LoopState {
    return this.state;
  }

  async run(): Promise<ChatRunResult> {
    this.transcript = await this.openSession();
    let exchanges = 0;

    for (;;) {
      this.transition('awaiting-input');
      const text = await this.readTurn();
      if (text.trim() === '') break;
      this.transcript = appendUserTurn(this.transcript, text);

      this.transition('sending');
      const outcome = await this.send(this.transcript);
      exchanges++;

      this.transition('rendering');
      this.settle(outcome);

      if (!this.options.interactive) break;
    }

    this.transition('terminated');
    return { exchanges, transcript: this.transcript };
  }

  private async openSession(): Promise<Transcript> {
    if (this.options.resume) return this.resumeSession();
    if (!this.options.interactive) return [];

    this.deps.bus.emitEvent({ type: 'prompt.resume' });
    const answer = await this.deps.input.nextLine();
    return answer?.trim().toLowerCase() === 'y' ? this.resumeSession() : [];
  }

  private resumeSession(): Transcript {
    const transcript = this.deps.store.load();
    this.deps.bus.emitEvent({ type: 'session.resumed', turns: transcript.length });
    return transcript;
  }

  private async readTurn(): Promise<string> {
    if (this.options.interactive) {
      this.deps.bus.emitEvent({ type: 'prompt.turn' });
      return collectTurn(this.deps.input);
    }

    const text = await collectAll(this.deps.input);
    if (text !== '') this.deps.bus.emitEvent({ type: 'turn.piped', text });
    return text;
  }

  /** The indicator is stopped and awaited before anything is rendered. */
  private async send(transcript: Transcript): Promise<CompletionOutcome> {
    const progress = this.options.interactive ? this.deps.indicator?.start() : undefined;
    try {
      return await this.deps.client.complete(transcript, this.options.model);
    } finally {
      await progress?.stop();
    }
  }

  private settle(outcome: CompletionOutcome): void {
    switch (outcome.kind) {
      case 'reply':
        this.deps.bus.emitEvent({ type: 'reply.received', text: outcome.text });
        this.transcript = appendAssistantTurn(this.transcript, outcome.text);
        this.persist();
        break;

      case 'empty':
        this.deps.bus.emitEvent({ type: 'reply.empty' });
        break;

      case 'failure': {
        const message = describeFailure(outcome.failure);
        this.logger.debug(`Exchange failed (${outcome.failure.type}): ${message}`);
        this.deps.bus.emitEvent({ type: 'exchange.failed', failure: outcome.failure, message });
        break;
      }
    }
  }

  private persist(): void {
    const { store } = this.deps;
    try {
      store.save(this.transcript);
    } catch (err) {
      this.logger.warn(
        `Could not save session to ${store.path}: ${err instanceof Error ? err.message : String(err)}`,
      );
      return;
    }
    this.deps.bus.emitEvent({ type: 'session.saved', turns: this.transcript.length, path: store.path });
  }

  private transition(next: LoopState): void {
    this.logger.debug(`chat loop: ${this.state} -> ${next}`);
    this.state = next;
  }
}
