import { execa } from 'execa';
import { CancelledError, stripAnsi, tailLines, type LintConfig } from '@mender/shared';
import type { WorkerContext } from './types';

export interface LinterOptions extends Pick<LintConfig, 'args' | 'timeoutMs' | 'maxOutputLines'> {
  command: string;
  root: string;
}

/**
 * Runs the configured linter on one resource and returns the tail of its
 * output. Linters exit non-zero when they find something, so the exit code
 * is ignored. A linter that cannot run yields undefined and the audit goes on
 * without it.
 */
export async function runLinter(
  options: LinterOptions,
  resource: string,
  ctx: WorkerContext,
): Promise<string | undefined> {
  const { command, args, root, timeoutMs, maxOutputLines } = options;
  const commandLine = [command, ...args, resource].join(' ');

  const result = await execa(command, [...args, resource], {
    cwd: root,
    reject: false,
    all: true,
    timeout: timeoutMs,
    signal: ctx.abortSignal,
    env: { FORCE_COLOR: '0', NO_COLOR: '1' },
  });

  if (result.isCanceled) {
    throw new CancelledError(`${commandLine} was cancelled`);
  }
  if (result.timedOut) {
    await ctx.logger.warn(`${commandLine} timed out after ${timeoutMs}ms; auditing without it`);
    return undefined;
  }
  if (result.exitCode === undefined) {
    await ctx.logger.warn(`Could not run ${commandLine}; auditing without it`);
    return undefined;
  }

  const output = stripAnsi(result.all ?? `${result.stdout}\n${result.stderr}`).trim();
  await ctx.logger.debug(`${commandLine} exited with ${result.exitCode}`);
  return output === '' ? undefined : tailLines(output, maxOutputLines);
}
