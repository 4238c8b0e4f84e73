import { Command } from 'commander';
import * as fs from 'fs/promises';
import path from 'path';
import {
  CommandJudge,
  ConfigLoader,
  ControlLoop,
  LlmAuditor,
  LlmFixer,
  createDefaultRegistry,
  parseDuration,
  resolveRoleProviders,
  type LoopResult,
  type RoleProviders,
  type TerminalTag,
} from '@mender/core';
import { discoverResources } from '@mender/repo';
import {
  JsonlLogger,
  RUN_SUMMARY_SCHEMA_VERSION,
  SummaryWriter,
  UsageError,
  createRunDir,
  type ConfigInput,
  type RunSummary,
} from '@mender/shared';
import { OutputRenderer } from '../output/renderer';
import type { GlobalOptions } from '../program';

export const EXIT_CODES: Record<TerminalTag, number> = {
  SUCCESS: 0,
  PARTIAL: 0,
  STOPPED: 0,
  NEEDS_HUMAN: 1,
  MAX_ITERATIONS: 1,
  ERROR: 1,
  CANCELLED: 130,
};

export interface RunFlags {
  maxIterations?: string;
  model?: string;
  timeout?: string;
  testCommand?: string;
  lintCommand?: string;
  /** false when --no-triage is passed */
  triage?: boolean;
}

export interface RunEnvironment {
  argv?: string[];
  env?: NodeJS.ProcessEnv;
  homeDir?: string;
  signal?: AbortSignal;
}

export interface RunOutcome {
  result: LoopResult;
  summary: RunSummary;
  summaryPath: string;
  exitCode: number;
}

function parseMaxIterations(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 1) {
    throw new UsageError(`--max-iterations must be a positive integer, got '${value}'`);
  }
  return n;
}

function parseCommand(flag: string, value: string): { command: string; args: string[] } {
  const [command, ...args] = value.trim().split(/\s+/);
  if (!command) {
    throw new UsageError(`${flag} must not be empty`);
  }
  return { command, args };
}

/** Translates run flags into the highest-precedence config layer. */
export function flagsToConfig(flags: RunFlags): ConfigInput {
  const testCommand =
    flags.testCommand === undefined ? undefined : parseCommand('--test-command', flags.testCommand);
  const lintCommand =
    flags.lintCommand === undefined ? undefined : parseCommand('--lint-command', flags.lintCommand);
  return {
    loop: {
      maxIterations: flags.maxIterations === undefined ? undefined : parseMaxIterations(flags.maxIterations),
      phaseTimeoutMs: flags.timeout === undefined ? undefined : parseDuration(flags.timeout),
    },
    defaults: flags.model
      ? { auditor: flags.model, fixer: flags.model, judge: flags.model }
      : undefined,
    judge: {
      command: testCommand?.command,
      args: testCommand?.args,
      triage: flags.triage === false ? false : undefined,
    },
    lint: { command: lintCommand?.command, args: lintCommand?.args },
  };
}

async function assertDirectory(target: string): Promise<void> {
  const stats = await fs.stat(target).catch((error: unknown) => {
    throw new UsageError(`Target directory not found: ${target}`, { cause: error });
  });
  if (!stats.isDirectory()) {
    throw new UsageError(`Target is not a directory: ${target}`);
  }
}

export function buildRunSummary(input: {
  runId: string;
  command: string[];
  target: string;
  result: LoopResult;
  providers: RoleProviders;
  triage: boolean;
  tracePath: string;
}): RunSummary {
  const { result, providers } = input;
  return {
    schemaVersion: RUN_SUMMARY_SCHEMA_VERSION,
    runId: input.runId,
    command: input.command,
    target: input.target,
    startedAt: result.startedAt,
    finishedAt: result.finishedAt,
    durationMs: result.durationMs,
    tag: result.tag,
    message: result.message,
    iterations: result.iterations,
    maxIterations: result.maxIterations,
    issuesFound: result.issuesFound,
    filesModified: result.filesModified,
    phaseDurationsMs: { ...result.phaseDurations },
    verdict: result.verdict ? { ...result.verdict } : undefined,
    selectedProviders: {
      auditor: providers.auditor,
      fixer: providers.fixer,
      judge: input.triage ? providers.judge : undefined,
    },
    artifacts: { tracePath: input.tracePath },
  };
}

/**
 * Loads config, wires the workers and runs the loop against `targetArg`.
 * Configuration problems surface as ConfigError/UsageError before the
 * first iteration.
 */
export async function executeRun(
  targetArg: string,
  flags: RunFlags,
  globals: GlobalOptions,
  environment: RunEnvironment = {},
): Promise<RunOutcome> {
  const target = path.resolve(targetArg);
  await assertDirectory(target);

  const env = environment.env ?? process.env;
  const config = ConfigLoader.load({
    cwd: target,
    configPath: globals.config,
    flags: flagsToConfig(flags),
    homeDir: environment.homeDir,
    env,
  });

  const providers = resolveRoleProviders(config);
  const registry = createDefaultRegistry(config, env);
  const { command: lintCommand, ...lint } = config.lint;
  const auditor = new LlmAuditor(
    registry.getAdapter(providers.auditor),
    target,
    registry.callOptions(providers.auditor),
    lintCommand ? { ...lint, command: lintCommand, root: target } : undefined,
  );
  const fixer = new LlmFixer(
    registry.getAdapter(providers.fixer),
    target,
    registry.callOptions(providers.fixer),
  );
  const triage = config.judge.triage;
  const judge = new CommandJudge({
    ...config.judge,
    root: target,
    triage: triage ? registry.getAdapter(providers.judge) : undefined,
    triageCallOptions: triage ? registry.callOptions(providers.judge) : undefined,
  });

  const runId = Date.now().toString();
  const artifacts = await createRunDir(target, runId);
  const logger = new JsonlLogger(
    artifacts.trace,
    { runId },
    globals.verbose ? 'debug' : globals.json ? 'warn' : 'info',
  );

  const { resources, warnings } = await discoverResources(target, {
    include: config.resources.include,
    exclude: config.resources.exclude,
    maxFileBytes: config.resources.maxFileBytes,
  });
  for (const warning of warnings) {
    await logger.warn(warning);
  }
  if (resources.length === 0) {
    await logger.warn(`No resources matched in ${target}`);
  }

  const loop = new ControlLoop({
    auditor,
    fixer,
    judge,
    resources,
    maxIterations: config.loop.maxIterations,
    phaseTimeoutMs: config.loop.phaseTimeoutMs,
    runId,
    logger,
    target,
    model: flags.model,
  });
  const result = await loop.run(environment.signal);

  const summary = buildRunSummary({
    runId,
    command: environment.argv ?? process.argv.slice(2),
    target,
    result,
    providers,
    triage,
    tracePath: artifacts.trace,
  });
  const summaryPath = await SummaryWriter.write(summary, artifacts.root);

  return { result, summary, summaryPath, exitCode: EXIT_CODES[result.tag] };
}

export function registerRunCommand(program: Command): void {
  program
    .command('run')
    .argument('<target>', 'Directory to audit and fix')
    .description('Run the audit, fix and judge loop until it converges')
    .option('--max-iterations <n>', 'Maximum loop iterations')
    .option('--model <provider>', 'Provider to use for every role')
    .option('--timeout <duration>', 'Per-phase timeout (e.g. 90s, 10m)')
    .option('--test-command <cmd>', 'Command the judge runs (e.g. "npm test")')
    .option('--lint-command <cmd>', 'Linter whose output feeds the audit (e.g. "ruff check")')
    .option('--no-triage', 'Do not ask the judge provider to classify failures')
    .action(async (target: string, flags: RunFlags) => {
      const globals: GlobalOptions = program.opts();
      const renderer = new OutputRenderer(!!globals.json);

      const controller = new AbortController();
      const onSigint = () => {
        renderer.log('Cancelling after the current phase...');
        controller.abort();
      };
      process.once('SIGINT', onSigint);

      try {
        const outcome = await executeRun(target, flags, globals, { signal: controller.signal });
        renderer.render(outcome.summary, outcome.summaryPath);
        process.exitCode = outcome.exitCode;
      } finally {
        process.off('SIGINT', onSigint);
      }
    });
}
