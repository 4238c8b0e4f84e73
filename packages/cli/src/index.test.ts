import { describe, it, expect } from 'vitest';
import { CommanderError } from 'commander';
import { ConfigError, ProviderError, UsageError } from '@mender/shared';
import { createProgram, exitCodeForError, name } from './program';

describe('cli package', () => {
  it('exports name', () => {
    expect(name).toBe('@mender/cli');
  });

  it('registers the run and doctor commands with global flags', () => {
    const program = createProgram();

    expect(program.name()).toBe('mender');
    expect(program.commands.map((c) => c.name())).toEqual(['run', 'doctor']);
    expect(program.options.map((o) => o.long)).toEqual(['--version', '--json', '--config', '--verbose']);
  });

  it('maps errors to exit codes', () => {
    expect(exitCodeForError(new ConfigError('bad'))).toBe(2);
    expect(exitCodeForError(new UsageError('bad'))).toBe(2);
    expect(exitCodeForError(new ProviderError('down'))).toBe(1);
    expect(exitCodeForError(new Error('boom'))).toBe(1);
    expect(exitCodeForError(new CommanderError(1, 'commander.unknownOption', 'unknown'))).toBe(2);
    expect(exitCodeForError(new CommanderError(0, 'commander.helpDisplayed', '(outputHelp)'))).toBe(0);
  });
});
