// packages/core/src/memory/session-store.ts

import { existsSync, mkdirSync, readFileSync, renameSync, rmSync, writeFileSync } from 'node:fs';
import { dirname } from 'node:path';
import { z } from 'zod';
import type { Transcript } from '../types/transcript.js';
import type { Logger } from '../utils/logger.js';
import { silentLogger } from '../utils/logger.js';

const transcriptSchema = z.array(
  z.object({
    role: z.enum(['user', 'assistant']),
    content: z.string(),
  }),
);

/** Persistence seam used by the interaction loop. */
export interface TranscriptStore {
  readonly path: string;
  load(): Transcript;
  save(transcript: Transcript): void;
}

/**
 * Keeps the most recent conversation in a single JSON file. Each save
 * overwrites the whole record; the last writer wins.
 */
export class SessionStore implements TranscriptStore {
  constructor(
    readonly path: string,
    private logger: Logger = silentLogger,
  ) {}

  /**
   * Return the saved transcript, or an empty one when there is nothing usable
   * on disk. Resuming is a convenience, so a bad record never stops a run.
   */
  load(): Transcript {
    let raw: string;
    try {
      raw = readFileSync(this.path, 'utf-8');
    } catch (err) {
      this.logger.debug(`No session at ${this.path}: ${describe(err)}`);
      return [];
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (err) {
      this.logger.warn(`Ignoring unreadable session ${this.path}: ${describe(err)}`);
      return [];
    }

    const result = transcriptSchema.safeParse(parsed);
    if (!result.success) {
      this.logger.warn(`Ignoring malformed session ${this.path}: ${result.error.issues[0]?.message ?? 'invalid'}`);
      return [];
    }
    return result.data;
  }

  save(transcript: Transcript): void {
    mkdirSync(dirname(this.path), { recursive: true });
    const tmpPath = `${this.path}.tmp`;
    writeFileSync(tmpPath, JSON.stringify(transcript), 'utf-8');
    renameSync(tmpPath, this.path);
    this.logger.debug(`Saved ${transcript.length} turn(s) to ${this.path}`);
  }

  /** Remove the saved session. Returns false when there was none. */
  clear(): boolean {
    if (!existsSync(this.path)) return false;
    rmSync(this.path);
    return true;
  }
}

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
