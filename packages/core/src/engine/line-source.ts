// packages/core/src/engine/line-source.ts -- Line-oriented input for the interaction loop

import { createInterface } from 'node:readline';

export interface LineSource {
  /** Next line without its terminator, or null at end of input. */
  nextLine(): Promise<string | null>;
  close(): void;
}

/** Read lines from a stream such as process.stdin. */
export function createLineSource(input: NodeJS.ReadableStream): LineSource {
  const rl = createInterface({ input, crlfDelay: Infinity, terminal: false });
  const lines = rl[Symbol.asyncIterator]();
  let closed = false;

  return {
    async nextLine() {
      if (closed) return null;
      const next = await lines.next();
      return next.done ? null : next.value;
    },
    close() {
      if (closed) return;
      closed = true;
      rl.close();
    },
  };
}

/**
 * Collect one multi-line turn: lines up to the first blank line or end of
 * input, joined with newlines. An empty result means the user is done.
 */
export async function collectTurn(source: LineSource): Promise<string> {
  const lines: string[] = [];
  for (;;) {
    const line = await source.nextLine();
    if (line === null || line.trim() === '') break;
    lines.push(line);
  }
  return lines.join('\n');
}

/** Read everything that is left, trimmed. Used for piped input. */
export async function collectAll(source: LineSource): Promise<string> {
  const lines: string[] = [];
  for (;;) {
    const line = await source.nextLine();
    if (line === null) break;
    lines.push(line);
  }
  return lines.join('\n').trim();
}
