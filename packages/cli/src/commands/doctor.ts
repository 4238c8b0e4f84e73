import { Command } from 'commander';
import path from 'path';
import which from 'which';
import chalk from 'chalk';
import type { Config } from '@mender/shared';
import { ConfigLoader, REPO_CONFIG_FILE, resolveRoleProviders } from '@mender/core';
import type { GlobalOptions } from '../program';

export const CHECKS = {
  OK: chalk.green('✔'),
  WARN: chalk.yellow('!'),
  FAIL: chalk.red('✖'),
};

export type CheckResult = [string, string];

export async function checkExecutable(name: string): Promise<CheckResult> {
  const found = await which(name, { nothrow: true });
  return found ? [CHECKS.OK, `${name} found at: ${found}`] : [CHECKS.FAIL, `${name} not found in PATH.`];
}

export function checkProviderConfig(config: Config, env: NodeJS.ProcessEnv): CheckResult[] {
  const providers = Object.entries(config.providers);
  if (providers.length === 0) {
    return [[CHECKS.FAIL, 'No providers configured. Add one under `providers`.']];
  }

  const results: CheckResult[] = [];
  for (const [name, provider] of providers) {
    if (provider.type !== 'openai') {
      results.push([CHECKS.OK, `Provider '${name}' (${provider.type}) needs no API key.`]);
    } else if (provider.api_key) {
      results.push([CHECKS.OK, `Provider '${name}' (openai) has an inline api_key.`]);
    } else if (!provider.api_key_env) {
      results.push([CHECKS.FAIL, `Provider '${name}' (openai) is missing an api_key or api_key_env.`]);
    } else if (env[provider.api_key_env]) {
      results.push([CHECKS.OK, `Provider '${name}' (openai) reads its key from ${provider.api_key_env}.`]);
    } else {
      results.push([CHECKS.FAIL, `Provider '${name}' (openai): ${provider.api_key_env} is not set.`]);
    }
  }

  try {
    const roles = resolveRoleProviders(config);
    results.push([
      CHECKS.OK,
      `Roles: auditor=${roles.auditor}, fixer=${roles.fixer}, judge=${roles.judge}`,
    ]);
  } catch (error: unknown) {
    results.push([CHECKS.FAIL, error instanceof Error ? error.message : String(error)]);
  }
  return results;
}

export async function runDoctorChecks(
  cwd: string,
  globals: GlobalOptions,
  env: NodeJS.ProcessEnv = process.env,
  homeDir?: string,
): Promise<CheckResult[]> {
  const results: CheckResult[] = [];
  try {
    const config = ConfigLoader.load({ cwd, configPath: globals.config, env, homeDir });
    results.push([CHECKS.OK, `Configuration loaded (${REPO_CONFIG_FILE} in ${cwd}).`]);
    results.push(...checkProviderConfig(config, env));
    results.push(await checkExecutable(config.judge.command));
  } catch (error: unknown) {
    const message = error instanceof Error ? error.message : String(error);
    results.push([CHECKS.FAIL, `Failed to load configuration: ${message}`]);
  }
  return results;
}

export const registerDoctorCommand = (program: Command) => {
  const command = new Command('doctor');

  command
    .description('Check configuration, provider keys and the test command.')
    .argument('[target]', 'Directory whose config to check', '.')
    .action(async (target: string) => {
      const globals: GlobalOptions = program.opts();
      const results = await runDoctorChecks(path.resolve(target), globals);

      if (globals.json) {
        console.log(
          JSON.stringify(
            results.map(([status, message]) => ({ ok: status !== CHECKS.FAIL, message })),
            null,
            2,
          ),
        );
      } else {
        console.log(chalk.bold('Mender Environment Checkup'));
        console.log('---------------------------------');
        results.forEach(([status, message]) => console.log(`${status} ${message}`));
        console.log('---------------------------------');
      }

      const hasFailures = results.some(([status]) => status === CHECKS.FAIL);
      if (hasFailures) {
        if (!globals.json) {
          console.log(
            chalk.red.bold('Doctor checks failed.') + ' Please resolve the issues marked with ' + CHECKS.FAIL,
          );
        }
        process.exitCode = 1;
      } else if (!globals.json) {
        console.log(chalk.green.bold('All checks passed. Your environment looks good!'));
      }
    });

  program.addCommand(command);
};
