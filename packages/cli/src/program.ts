// packages/cli/src/program.ts -- Command registration

import { Command, Option } from 'commander';

import { MODELS, VERSION } from '@palaver/core';

import { chatCommand } from './commands/chat.js';
import type { ChatOptions } from './commands/chat.js';
import { modelsCommand } from './commands/models.js';
import { sessionClearCommand, sessionShowCommand } from './commands/session.js';
import { setupCommand } from './commands/setup.js';
import { withErrorHandling } from './utils.js';

export interface ProgramActions {
  chat(options: ChatOptions): Promise<void>;
  setup(): Promise<void>;
  models(): Promise<void>;
  sessionShow(): Promise<void>;
  sessionClear(): Promise<void>;
}

const defaultActions: ProgramActions = {
  chat: withErrorHandling(chatCommand),
  setup: withErrorHandling(setupCommand),
  models: withErrorHandling(modelsCommand),
  sessionShow: withErrorHandling(sessionShowCommand),
  sessionClear: withErrorHandling(sessionClearCommand),
};

export function createProgram(actions: ProgramActions = defaultActions): Command {
  const program = new Command();

  program
    .name('palaver')
    .description('Chat with a hosted model from the terminal')
    .version(VERSION)
    .option('--verbose', 'Enable debug logging');

  program
    .command('chat', { isDefault: true })
    .description('Start a conversation (default). Reads a single prompt from stdin when piped')
    .option('--continue', 'Continue the previous session')
    .option('--interactive', 'Always prompt interactively, even when stdin is not a terminal')
    .addOption(new Option('--model <name>', 'Model to use for this run').choices(MODELS))
    .action((_options: ChatOptions, command: Command) => actions.chat(command.optsWithGlobals<ChatOptions>()));

  program
    .command('setup')
    .description('Enter the API key and choose the default model')
    .action(() => actions.setup());

  program
    .command('models')
    .description('List available models')
    .action(() => actions.models());

  const session = program
    .command('session')
    .description('Manage the saved conversation');

  session
    .command('show')
    .description('Print the saved conversation as JSON')
    .action(() => actions.sessionShow());

  session
    .command('clear')
    .description('Delete the saved conversation')
    .action(() => actions.sessionClear());

  return program;
}
