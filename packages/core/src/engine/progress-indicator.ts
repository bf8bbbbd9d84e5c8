// packages/core/src/engine/progress-indicator.ts -- "Loading..." dots shown while a request is in flight

import { PROGRESS_TICK_MS } from '../utils/constants.js';
import { CancellationToken } from './cancellation.js';

/** Anything with a `write`, such as process.stdout. */
export interface TextSink {
  write(chunk: string): unknown;
}

/** A running indicator. `stop()` resolves once it has written its last byte. */
export interface ProgressHandle {
  stop(): Promise<void>;
}

export interface ProgressIndicator {
  /** Start ticking. Every call gets its own cancellation token. */
  start(): ProgressHandle;
}

export interface DotsIndicatorOptions {
  tickMs?: number;
  label?: string;
}

/**
 * Writes a label, then one dot per tick until stopped. The token is checked
 * after every dot, so a stop takes effect within one tick.
 */
export class DotsIndicator implements ProgressIndicator {
  private readonly tickMs: number;
  private readonly label: string;

  constructor(
    private out: TextSink,
    options?: DotsIndicatorOptions,
  ) {
    this.tickMs = options?.tickMs ?? PROGRESS_TICK_MS;
    this.label = options?.label ?? 'Loading';
  }

  start(): ProgressHandle {
    const token = new CancellationToken();
    this.out.write(`\n${this.label}`);
    const running = this.tick(token);

    return {
      stop: async () => {
        token.cancel();
        await running;
      },
    };
  }

  private async tick(token: CancellationToken): Promise<void> {
    while (!token.isCancelled) {
      this.out.write('.');
      const elapsed = await token.sleep(this.tickMs);
      if (!elapsed) break;
    }
    this.out.write('\n');
  }
}
