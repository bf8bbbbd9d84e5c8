// packages/cli/src/render.ts -- Terminal rendering for chat loop events

import { CancellationToken, DotsIndicator } from '@palaver/core';
import type { ChatEvent, IndicatorStyle, ProgressHandle, ProgressIndicator, TextSink } from '@palaver/core';
import chalk, { type ChalkInstance } from 'chalk';
import ora, { type Options as OraOptions } from 'ora';

export const INPUT_PROMPT = '>>> ';
export const OUTPUT_PROMPT = '<<< ';

export interface RendererOptions {
  out?: TextSink;
  err?: TextSink;
  color?: ChalkInstance;
}

/**
 * Build the listener that prints chat loop events. Conversation text goes to
 * `out`; side notes go to `err`.
 */
export function createRenderer(options: RendererOptions = {}): (event: ChatEvent) => void {
  const out = options.out ?? process.stdout;
  const err = options.err ?? process.stderr;
  const c = options.color ?? chalk;

  return (event) => {
    switch (event.type) {
      case 'prompt.resume':
        out.write('Continue last session? (y/n): ');
        break;

      case 'prompt.turn':
        out.write(`${c.cyan(INPUT_PROMPT)}\n`);
        break;

      case 'turn.piped':
        out.write(`${INPUT_PROMPT}\n${event.text}`);
        break;

      case 'reply.received':
        out.write(`\n${c.green(OUTPUT_PROMPT)}\n${event.text}\n`);
        break;

      case 'reply.empty':
        out.write(`\n${c.yellow(`${OUTPUT_PROMPT}No response received.`)}\n`);
        break;

      case 'exchange.failed':
        out.write(`\n${c.red(`${OUTPUT_PROMPT}Error: ${event.message}`)}\n`);
        break;

      case 'session.resumed':
        err.write(c.dim(`Resumed ${event.turns} turn(s) from the last session.\n`));
        break;

      case 'session.saved':
        break;
    }
  };
}

export function printWelcome(out: TextSink = process.stdout, c: ChalkInstance = chalk): void {
  out.write(`\n${c.bold('Welcome to palaver!')}\n\n`);
  out.write(c.gray("Type 'Ctrl-D' or leave a blank line to end input and get the response.\n\n"));
}

export type SpinnerOptions = Pick<OraOptions, 'text' | 'stream' | 'isEnabled'>;

/**
 * ora spinner with the same start/stop contract as the dots indicator.
 *
 * stdin is left alone: ora would otherwise switch it to raw mode and pause it
 * on stop, and the line reader needs it flowing for the next turn.
 */
export class SpinnerIndicator implements ProgressIndicator {
  constructor(private options: SpinnerOptions = {}) {}

  start(): ProgressHandle {
    const token = new CancellationToken();
    const spinner = ora({
      text: 'Waiting for reply',
      ...this.options,
      color: 'cyan',
      discardStdin: false,
    }).start();
    const stopped = new Promise<void>((resolve) => {
      token.onCancel(() => {
        spinner.stop();
        resolve();
      });
    });

    return {
      stop: async () => {
        token.cancel();
        await stopped;
      },
    };
  }
}

export function createIndicator(style: IndicatorStyle, out: TextSink = process.stdout): ProgressIndicator {
  return style === 'spinner' ? new SpinnerIndicator() : new DotsIndicator(out);
}
