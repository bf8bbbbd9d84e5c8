import { describe, expect, it, vi } from 'vitest';
import type { Command } from 'commander';
import { MODELS } from '@palaver/core';
import { createProgram } from '../src/program.js';
import type { ProgramActions } from '../src/program.js';

function stubActions() {
  return {
    chat: vi.fn<ProgramActions['chat']>(async () => {}),
    setup: vi.fn<ProgramActions['setup']>(async () => {}),
    models: vi.fn<ProgramActions['models']>(async () => {}),
    sessionShow: vi.fn<ProgramActions['sessionShow']>(async () => {}),
    sessionClear: vi.fn<ProgramActions['sessionClear']>(async () => {}),
  };
}

/** Throw instead of exiting, and keep commander's own output quiet. */
function quiet(command: Command): void {
  command.exitOverride().configureOutput({ writeOut: () => {}, writeErr: () => {} });
  for (const sub of command.commands) quiet(sub);
}

function build() {
  const actions = stubActions();
  const program = createProgram(actions);
  quiet(program);
  return { program, actions };
}

describe('palaver program', () => {
  it('registers chat, setup, models and session commands', () => {
    const { program } = build();
    expect(program.commands.map((c) => c.name())).toEqual(['chat', 'setup', 'models', 'session']);
    const session = program.commands.find((c) => c.name() === 'session');
    expect(session?.commands.map((c) => c.name())).toEqual(['show', 'clear']);
  });

  it('runs chat by default', async () => {
    const { program, actions } = build();
    await program.parseAsync([], { from: 'user' });
    expect(actions.chat).toHaveBeenCalledWith({});
  });

  it('passes chat flags through the default command', async () => {
    const { program, actions } = build();
    await program.parseAsync(['--continue', '--model', 'GPT-5'], { from: 'user' });
    expect(actions.chat).toHaveBeenCalledWith({ continue: true, model: 'GPT-5' });
  });

  it('merges the global --verbose flag into chat options', async () => {
    const { program, actions } = build();
    await program.parseAsync(['--verbose', 'chat', '--interactive'], { from: 'user' });
    expect(actions.chat).toHaveBeenCalledWith({ verbose: true, interactive: true });
  });

  it('offers every model as a --model choice', () => {
    const { program } = build();
    const chat = program.commands.find((c) => c.name() === 'chat');
    const model = chat?.options.find((o) => o.long === '--model');
    expect(model?.argChoices).toEqual([...MODELS]);
  });

  it('rejects a model outside the list', async () => {
    const { program, actions } = build();
    await expect(program.parseAsync(['chat', '--model', 'gpt-2'], { from: 'user' })).rejects.toMatchObject({
      code: 'commander.invalidArgument',
    });
    expect(actions.chat).not.toHaveBeenCalled();
  });

  it('dispatches the other commands', async () => {
    const { program, actions } = build();
    await program.parseAsync(['models'], { from: 'user' });
    expect(actions.models).toHaveBeenCalledTimes(1);

    const again = build();
    await again.program.parseAsync(['session', 'clear'], { from: 'user' });
    expect(again.actions.sessionClear).toHaveBeenCalledTimes(1);
    expect(again.actions.sessionShow).not.toHaveBeenCalled();
  });
});
