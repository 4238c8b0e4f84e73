import { execa } from 'execa';
import {
  CancelledError,
  ProcessError,
  TimeoutError,
  errorMessage,
  extractFirstJsonObject,
  isRecord,
  stripAnsi,
  tailLines,
  type JudgeConfig,
} from '@mender/shared';
import type { ProviderAdapter } from '@mender/adapters';
import { normalizeVerdict } from '../model/verdict';
import type { Verdict } from '../model/types';
import { triageMessages } from './prompts';
import { toAdapterContext, type ProviderCallOptions } from './context';
import type { Judge, WorkerContext } from './types';

export interface TestCounts {
  passed: number;
  failed: number;
}

const SUMMARY_LINE = /^\s*Tests:?\s/;
const COUNT_LINE = /\d+\s+(?:passed|failed|errors?)\b/;
const OUTPUT_TAIL_LINES = 60;

function count(line: string, pattern: RegExp): number {
  const match = pattern.exec(line);
  return match ? Number(match[1]) : 0;
}

/**
 * Reads pass/fail counts from test runner output.
 *
 * A jest or vitest `Tests:` summary wins; otherwise the last line mentioning
 * passed or failed tests is used (pytest). Errors count as failures.
 */
export function parseTestCounts(output: string): TestCounts | undefined {
  const lines = stripAnsi(output).split(/\r?\n/);
  const line =
    lines.find((l) => SUMMARY_LINE.test(l) && COUNT_LINE.test(l)) ??
    [...lines].reverse().find((l) => COUNT_LINE.test(l));
  if (line === undefined) return undefined;

  return {
    passed: count(line, /(\d+)\s+passed/),
    failed: count(line, /(\d+)\s+failed/) + count(line, /(\d+)\s+errors?\b/),
  };
}

export interface CommandJudgeOptions extends Pick<
  JudgeConfig,
  'command' | 'args' | 'timeoutMs' | 'noTestsExitCodes'
> {
  root: string;
  /** Classifies failing runs when set */
  triage?: ProviderAdapter;
  triageCallOptions?: ProviderCallOptions;
}

/** Runs the project's test command in the target directory and turns the result into a Verdict. */
export class CommandJudge implements Judge {
  constructor(private readonly options: CommandJudgeOptions) {}

  async judge(_resources: readonly string[], ctx: WorkerContext): Promise<Verdict> {
    const { command, args, root, timeoutMs, noTestsExitCodes } = this.options;
    const commandLine = [command, ...args].join(' ');

    const result = await execa(command, args, {
      cwd: root,
      reject: false,
      all: true,
      timeout: timeoutMs,
      signal: ctx.abortSignal,
      env: { FORCE_COLOR: '0', CI: '1' },
    });

    if (result.isCanceled) {
      throw new CancelledError(`${commandLine} was cancelled`);
    }
    if (result.timedOut) {
      throw new TimeoutError(`${commandLine} timed out after ${timeoutMs}ms`);
    }
    if (result.exitCode === undefined) {
      const detail =
        'shortMessage' in result && typeof result.shortMessage === 'string'
          ? result.shortMessage
          : 'the process did not start';
      throw new ProcessError(`Could not run ${commandLine}: ${detail}`);
    }

    const output = stripAnsi(result.all ?? `${result.stdout}\n${result.stderr}`);
    const counts = parseTestCounts(output);
    await ctx.logger.debug(
      `${commandLine} exited with ${result.exitCode} (${counts ? `${counts.passed} passed, ${counts.failed} failed` : 'no counts'})`,
    );

    if (result.exitCode === 0) {
      return normalizeVerdict({
        status: 'PASS',
        action: 'STOP',
        passed: counts?.passed ?? 0,
        failed: counts?.failed ?? 0,
        reason: 'All tests passed',
      });
    }

    if (noTestsExitCodes.includes(result.exitCode)) {
      return normalizeVerdict({
        status: 'PASS',
        action: 'STOP',
        passed: 0,
        failed: 0,
        reason: 'No tests were collected',
      });
    }

    if (counts && counts.failed > 0) {
      const fixable = normalizeVerdict({
        status: 'FAIL_FIXABLE',
        action: 'RETURN_TO_AUDIT',
        ...counts,
        reason: `${counts.failed} test(s) failed`,
      });
      return this.options.triage ? this.triage(commandLine, output, fixable, ctx) : fixable;
    }

    return normalizeVerdict({
      status: 'FAIL_UNCERTAIN',
      action: 'REQUIRE_HUMAN',
      passed: counts?.passed ?? 0,
      failed: counts?.failed ?? 0,
      reason: `${commandLine} exited with code ${result.exitCode}`,
    });
  }

  private async triage(
    commandLine: string,
    output: string,
    fallback: Verdict,
    ctx: WorkerContext,
  ): Promise<Verdict> {
    const { triage, triageCallOptions = {} } = this.options;
    if (!triage) return fallback;

    try {
      const response = await triage.generate(
        {
          messages: triageMessages(commandLine, tailLines(output, OUTPUT_TAIL_LINES)),
          jsonMode: true,
          temperature: 0,
        },
        toAdapterContext(ctx, triageCallOptions),
      );
      const answer = extractFirstJsonObject(response.text ?? '', isRecord);
      if (!isRecord(answer)) {
        await ctx.logger.warn('Triage answer contained no JSON object; keeping the test verdict');
        return fallback;
      }
      // Counts always come from the test run
      return normalizeVerdict({ ...answer, passed: fallback.passed, failed: fallback.failed });
    } catch (error) {
      if (ctx.abortSignal.aborted) throw error;
      await ctx.logger.warn(`Triage failed: ${errorMessage(error)}`);
      return fallback;
    }
  }
}
