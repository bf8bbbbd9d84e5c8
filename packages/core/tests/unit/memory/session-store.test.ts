import { existsSync, mkdirSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { SessionStore } from '../../../src/memory/session-store.js';
import type { Transcript } from '../../../src/types/transcript.js';

const TEST_DIR = join(tmpdir(), `palaver-session-${Date.now()}`);
const SESSION_PATH = join(TEST_DIR, 'session.json');

function recordingLogger() {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

beforeEach(() => {
  mkdirSync(TEST_DIR, { recursive: true });
});

afterEach(() => {
  rmSync(TEST_DIR, { recursive: true, force: true });
});

describe('SessionStore', () => {
  it('loads what it saved', () => {
    const store = new SessionStore(SESSION_PATH);
    const transcript: Transcript = [
      { role: 'user', content: 'Hello' },
      { role: 'assistant', content: 'Hi there' },
    ];
    store.save(transcript);
    expect(store.load()).toEqual(transcript);
  });

  it('round-trips an empty transcript', () => {
    const store = new SessionStore(SESSION_PATH);
    store.save([]);
    expect(store.load()).toEqual([]);
  });

  it('writes a plain JSON array of role/content records', () => {
    const store = new SessionStore(SESSION_PATH);
    store.save([{ role: 'user', content: 'Ping' }]);
    expect(readFileSync(SESSION_PATH, 'utf-8')).toBe('[{"role":"user","content":"Ping"}]');
    expect(existsSync(`${SESSION_PATH}.tmp`)).toBe(false);
  });

  it('overwrites the previous record', () => {
    const store = new SessionStore(SESSION_PATH);
    store.save([{ role: 'user', content: 'first' }]);
    store.save([{ role: 'user', content: 'second' }]);
    expect(store.load()).toEqual([{ role: 'user', content: 'second' }]);
  });

  it('creates the parent directory on save', () => {
    const nested = join(TEST_DIR, 'a', 'b', 'session.json');
    const store = new SessionStore(nested);
    store.save([{ role: 'user', content: 'Hello' }]);
    expect(existsSync(nested)).toBe(true);
  });

  it('returns an empty transcript when the file is missing', () => {
    const logger = recordingLogger();
    const store = new SessionStore(join(TEST_DIR, 'missing.json'), logger);
    expect(store.load()).toEqual([]);
    expect(logger.warn).not.toHaveBeenCalled();
  });

  it('returns an empty transcript and warns when the file is not JSON', () => {
    writeFileSync(SESSION_PATH, '{not json', 'utf-8');
    const logger = recordingLogger();
    const store = new SessionStore(SESSION_PATH, logger);
    expect(store.load()).toEqual([]);
    expect(logger.warn).toHaveBeenCalledTimes(1);
  });

  it('returns an empty transcript when the record has the wrong shape', () => {
    writeFileSync(SESSION_PATH, JSON.stringify({ role: 'user', content: 'Hello' }), 'utf-8');
    const store = new SessionStore(SESSION_PATH);
    expect(store.load()).toEqual([]);
  });

  it('rejects turns with an unknown role', () => {
    writeFileSync(SESSION_PATH, JSON.stringify([{ role: 'system', content: 'x' }]), 'utf-8');
    const store = new SessionStore(SESSION_PATH);
    expect(store.load()).toEqual([]);
  });

  it('clear() removes the file and reports whether there was one', () => {
    const store = new SessionStore(SESSION_PATH);
    store.save([{ role: 'user', content: 'Hello' }]);
    expect(store.clear()).toBe(true);
    expect(existsSync(SESSION_PATH)).toBe(false);
    expect(store.clear()).toBe(false);
  });
});
