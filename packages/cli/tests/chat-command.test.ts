import { mkdirSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import type { Mock, MockInstance } from 'vitest';
import { ConfigError } from '@palaver/core';
import type { FetchLike } from '@palaver/core';
import { chatCommand } from '../src/commands/chat.js';
import { withErrorHandling } from '../src/utils.js';
import { fakeInput, replaceStdin } from './terminal.js';

const TEST_DIR = join(tmpdir(), `palaver-chat-${Date.now()}`);

let restoreStdin: () => void;
let stdin: ReturnType<typeof fakeInput>;
let stdout: MockInstance<typeof process.stdout.write>;
let fetchMock: Mock<FetchLike>;

function writtenToStdout(): string[] {
  return stdout.mock.calls.map((call) => String(call[0]));
}

function sentModel(): unknown {
  const init = fetchMock.mock.calls[0][1];
  const body: unknown = JSON.parse(String(init.body));
  return typeof body === 'object' && body !== null && 'model' in body ? body.model : undefined;
}

function configure(yaml: string): void {
  writeFileSync(join(TEST_DIR, 'config.yml'), yaml, 'utf-8');
}

beforeEach(() => {
  mkdirSync(TEST_DIR, { recursive: true });
  vi.stubEnv('PALAVER_CONFIG_DIR', TEST_DIR);
  vi.stubEnv('PALAVER_API_KEY', '');
  vi.stubEnv('PALAVER_MODEL', '');
  vi.stubEnv('PALAVER_BASE_URL', '');

  stdin = fakeInput(false);
  restoreStdin = replaceStdin(stdin);
  stdout = vi.spyOn(process.stdout, 'write').mockImplementation(() => true);
  vi.spyOn(console, 'error').mockImplementation(() => {});

  fetchMock = vi.fn<FetchLike>(
    async () => new Response(JSON.stringify({ choices: [{ message: { content: 'Pong' } }] }), { status: 200 }),
  );
  vi.stubGlobal('fetch', fetchMock);
});

afterEach(() => {
  restoreStdin();
  vi.restoreAllMocks();
  vi.unstubAllEnvs();
  vi.unstubAllGlobals();
  process.exitCode = undefined;
  rmSync(TEST_DIR, { recursive: true, force: true });
});

describe('chatCommand', () => {
  it('refuses a piped run when no API key is configured', async () => {
    stdin.end('Ping\n');
    await expect(chatCommand({})).rejects.toThrow(ConfigError);
    await expect(chatCommand({})).rejects.toThrow('No API key configured.');
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it('exits with code 1 when wrapped for the command line', async () => {
    stdin.end('Ping\n');
    await withErrorHandling(chatCommand)({});
    expect(process.exitCode).toBe(1);
  });

  it('sends piped input once and saves the exchange', async () => {
    configure('api_key: test-secret\nmodel: GPT-5\n');
    stdin.end('Ping\n');

    await chatCommand({});

    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(sentModel()).toBe('GPT-5');
    expect(JSON.parse(readFileSync(join(TEST_DIR, 'session.json'), 'utf-8'))).toEqual([
      { role: 'user', content: 'Ping' },
      { role: 'assistant', content: 'Pong' },
    ]);
  });

  it('lets --model override the configured model', async () => {
    configure('api_key: test-secret\nmodel: GPT-5\n');
    stdin.end('Ping\n');

    await chatCommand({ model: 'Grok-4' });

    expect(sentModel()).toBe('Grok-4');
  });

  it('shows no progress indicator when piped', async () => {
    configure('api_key: test-secret\n');
    stdin.end('Ping\n');

    await chatCommand({});

    expect(writtenToStdout()).not.toContain('\nLoading');
  });

  it('shows the progress indicator when forced interactive', async () => {
    configure('api_key: test-secret\n');
    stdin.end('n\nHello\n\n');

    await chatCommand({ interactive: true });

    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(writtenToStdout()).toContain('\nLoading');
  });

  it('closes the input when the loop fails', async () => {
    configure('api_key: test-secret\n');
    stdout.mockImplementation((chunk: string | Uint8Array) => {
      if (String(chunk).startsWith('Continue last session?')) throw new Error('EPIPE');
      return true;
    });

    await expect(chatCommand({ interactive: true })).rejects.toThrow('EPIPE');
    expect(stdin.listenerCount('data')).toBe(0);
  });
});
