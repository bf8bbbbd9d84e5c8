// packages/cli/src/commands/session.ts -- Inspect or discard the saved conversation

import { SessionStore, createLogger, resolveConfigDir, sessionFilePath } from '@palaver/core';
import chalk from 'chalk';

function openStore(): SessionStore {
  return new SessionStore(sessionFilePath(resolveConfigDir()), createLogger('warn'));
}

// ── palaver session show ──

export async function sessionShowCommand(): Promise<void> {
  const store = openStore();
  const transcript = store.load();
  if (transcript.length === 0) {
    console.error(chalk.gray(`No saved session at ${store.path}`));
    return;
  }
  console.log(JSON.stringify(transcript, null, 2));
}

// ── palaver session clear ──

export async function sessionClearCommand(): Promise<void> {
  const store = openStore();
  if (store.clear()) {
    console.error(chalk.green(`Removed ${store.path}`));
  } else {
    console.error(chalk.gray(`No saved session at ${store.path}`));
  }
}
