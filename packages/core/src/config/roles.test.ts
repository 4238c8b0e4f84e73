import { describe, it, expect } from 'vitest';
import { ConfigSchema, ConfigError } from '@mender/shared';
import { resolveRoleProviders } from './roles';

const fake = { type: 'fake', model: 'fake' } as const;

describe('resolveRoleProviders', () => {
  it('uses the only provider for every role', () => {
    const config = ConfigSchema.parse({ providers: { local: fake } });

    expect(resolveRoleProviders(config)).toEqual({ auditor: 'local', fixer: 'local', judge: 'local' });
  });

  it('honours role defaults and falls back to the auditor for the judge', () => {
    const config = ConfigSchema.parse({
      providers: { a: fake, b: fake },
      defaults: { auditor: 'a', fixer: 'b' },
    });

    expect(resolveRoleProviders(config)).toEqual({ auditor: 'a', fixer: 'b', judge: 'a' });
  });

  it('requires a choice when several providers exist', () => {
    const config = ConfigSchema.parse({ providers: { a: fake, b: fake }, defaults: { auditor: 'a' } });

    expect(() => resolveRoleProviders(config)).toThrow(
      'No provider selected for the fixer role. Set defaults.fixer or pass --model.',
    );
  });

  it('reports a missing providers section', () => {
    expect(() => resolveRoleProviders(ConfigSchema.parse({}))).toThrow(ConfigError);
  });
});
