import { ConfigError, type Config } from '@mender/shared';

export interface RoleProviders {
  auditor: string;
  fixer: string;
  judge: string;
}

/**
 * Picks the provider name for each role. A single configured provider serves
 * every role without a default; the judge falls back to the auditor's.
 */
export function resolveRoleProviders(config: Config): RoleProviders {
  const names = Object.keys(config.providers);
  const only = names.length === 1 ? names[0] : undefined;

  const pick = (role: 'auditor' | 'fixer'): string => {
    const name = config.defaults[role] ?? only;
    if (!name) {
      throw new ConfigError(
        names.length === 0
          ? 'No providers configured. Add one under `providers` in .mender.yaml.'
          : `No provider selected for the ${role} role. Set defaults.${role} or pass --model.`,
      );
    }
    return name;
  };

  const auditor = pick('auditor');
  return { auditor, fixer: pick('fixer'), judge: config.defaults.judge ?? auditor };
}
