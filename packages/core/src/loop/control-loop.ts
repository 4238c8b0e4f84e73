import {
  AppError,
  ConfigError,
  SandboxViolationError,
  errorMessage,
  type EventBus,
  type Logger,
  type LoopPhase,
  type MenderEvent,
} from '@mender/shared';
import { normalizePlan, planIssueCount } from '../model/plan';
import { countModified, errorOutcomes, normalizeFixOutcome } from '../model/outcome';
import { normalizeVerdict, uncertainVerdict } from '../model/verdict';
import type { FixOutcome, Verdict } from '../model/types';
import type { Auditor, Fixer, Judge, WorkerContext } from '../workers/types';
import { detectAfterAudit, detectAfterJudge } from './detector';
import { beginIteration, canBeginIteration, initialState, reduce } from './state';
import { elapsedMs } from './statistics';
import { runWithTimeout } from './timeout';
import type { LoopResult, LoopState, TerminalTag } from './types';

export interface ControlLoopOptions {
  auditor: Auditor;
  fixer: Fixer;
  judge: Judge;
  /** Resource identifiers relative to the target root */
  resources: readonly string[];
  maxIterations: number;
  phaseTimeoutMs: number;
  runId: string;
  logger: Logger;
  /** Defaults to forwarding every event to `logger.log` */
  eventBus?: EventBus;
  /** Directory the resources live in, reported on RunStarted */
  target?: string;
  model?: string;
  clock?: () => number;
}

type PhaseOutcome<T> =
  | { ok: true; value: T; durationMs: number }
  | {
      ok: false;
      error: unknown;
      durationMs: number;
      /** The worker's own promise had not settled when the phase gave up on it */
      abandoned: boolean;
    };

function validateOptions(options: ControlLoopOptions): void {
  if (!options.auditor || !options.fixer || !options.judge) {
    throw new ConfigError('The control loop needs an auditor, a fixer and a judge');
  }
  if (!Number.isInteger(options.maxIterations) || options.maxIterations < 1) {
    throw new ConfigError(`maxIterations must be a positive integer, got ${options.maxIterations}`);
  }
  if (!Number.isFinite(options.phaseTimeoutMs) || options.phaseTimeoutMs <= 0) {
    throw new ConfigError(`phaseTimeoutMs must be positive, got ${options.phaseTimeoutMs}`);
  }
}

/**
 * Drives Audit → Fix → Judge until the detector reports a terminal tag.
 *
 * Worker failures are converted at the phase boundary: a fixer failure marks
 * every planned resource as ERROR, a judge failure asks for a human, and an
 * auditor failure or sandbox violation ends the run with ERROR.
 */
export class ControlLoop {
  private readonly clock: () => number;
  private readonly eventBus: EventBus;

  constructor(private readonly options: ControlLoopOptions) {
    validateOptions(options);
    this.clock = options.clock ?? Date.now;
    this.eventBus = options.eventBus ?? { emit: (event) => options.logger.log(event) };
  }

  async run(abortSignal: AbortSignal = new AbortController().signal): Promise<LoopResult> {
    const { auditor, fixer, judge, resources, maxIterations, logger } = this.options;
    let state = initialState(maxIterations, this.clock());
    let notes: string[] = [];

    await this.emit({
      ...this.meta(),
      type: 'RunStarted',
      payload: {
        target: this.options.target ?? '.',
        resourceCount: resources.length,
        maxIterations,
      },
    });

    const finish = async (tag: TerminalTag, reason: string): Promise<LoopResult> => {
      const finishedAt = this.clock();
      const message = notes.length > 0 ? `${reason} (${notes.join('; ')})` : reason;
      const result = this.toResult(state, tag, message, finishedAt);

      await this.emit({
        ...this.meta(),
        type: 'RunStopped',
        payload: { tag, reason: message, iteration: state.iteration },
      });
      await this.emit({
        ...this.meta(),
        type: 'RunFinished',
        payload: {
          tag,
          iterations: result.iterations,
          issuesFound: result.issuesFound,
          filesModified: result.filesModified,
          durationMs: result.durationMs,
        },
      });
      await logger.info(`Run finished: ${tag} - ${message}`);
      return result;
    };

    const cancelled = () =>
      finish('CANCELLED', `Run cancelled during iteration ${state.iteration}`);

    while (canBeginIteration(state)) {
      if (abortSignal.aborted) {
        return finish('CANCELLED', `Run cancelled after ${state.iteration} iteration(s)`);
      }
      state = beginIteration(state);
      notes = [];
      await this.emit({
        ...this.meta(),
        type: 'IterationStarted',
        payload: { iteration: state.iteration, maxIterations },
      });
      await logger.info(`Iteration ${state.iteration}/${maxIterations}`);

      // AUDIT
      const audit = await this.runPhase(state, 'AUDIT', abortSignal, (ctx) =>
        auditor.audit(resources, ctx),
      );
      if (!audit.ok) {
        if (abortSignal.aborted) return cancelled();
        return finish('ERROR', `Auditor failed: ${errorMessage(audit.error)}`);
      }
      state = reduce(state, {
        phase: 'AUDIT',
        plan: normalizePlan(audit.value),
        durationMs: audit.durationMs,
      });
      await this.phaseFinished(state, 'AUDIT', audit.durationMs, {
        issues: planIssueCount(state.plan),
        resources: state.plan.size,
      });

      const afterAudit = detectAfterAudit(state);
      if (afterAudit.kind === 'stop') {
        await this.iterationFinished(state);
        return finish(afterAudit.tag, afterAudit.reason);
      }

      // FIX
      const plan = state.plan;
      const fix = await this.runPhase(state, 'FIX', abortSignal, (ctx) =>
        fixer.fix(resources, plan, ctx),
      );
      let outcomes: FixOutcome[];
      if (fix.ok) {
        outcomes = fix.value.map(normalizeFixOutcome);
      } else {
        if (abortSignal.aborted) return cancelled();
        if (fix.error instanceof SandboxViolationError) {
          return finish('ERROR', `Sandbox violation: ${fix.error.message}`);
        }
        const message = errorMessage(fix.error);
        if (fix.abandoned) {
          // A fixer that may still write must not overlap with the judge.
          return finish('ERROR', `Fixer did not finish: ${message}`);
        }
        notes.push(`fixer failed: ${message}`);
        outcomes = errorOutcomes(plan.keys(), message);
      }
      state = reduce(state, { phase: 'FIX', outcomes, durationMs: fix.durationMs });
      await this.phaseFinished(state, 'FIX', fix.durationMs, {
        filesModified: countModified(outcomes),
        errors: outcomes.filter((o) => o.status === 'ERROR').length,
      });

      // JUDGE
      const judged = await this.runPhase(state, 'JUDGE', abortSignal, (ctx) =>
        judge.judge(resources, ctx),
      );
      let verdict: Verdict;
      if (judged.ok) {
        verdict = normalizeVerdict(judged.value);
      } else {
        if (abortSignal.aborted) return cancelled();
        verdict = uncertainVerdict(`Judge failed: ${errorMessage(judged.error)}`);
      }
      state = reduce(state, { phase: 'JUDGE', verdict, durationMs: judged.durationMs });
      await this.phaseFinished(state, 'JUDGE', judged.durationMs, {
        status: verdict.status,
        action: verdict.action,
        passed: verdict.passed,
        failed: verdict.failed,
      });

      await this.iterationFinished(state);
      const afterJudge = detectAfterJudge(state);
      if (afterJudge.kind === 'stop') {
        return finish(afterJudge.tag, afterJudge.reason);
      }
    }

    return finish('MAX_ITERATIONS', `Reached the iteration limit (${maxIterations})`);
  }

  private async runPhase<T>(
    state: LoopState,
    phase: LoopPhase,
    abortSignal: AbortSignal,
    fn: (ctx: WorkerContext) => Promise<T>,
  ): Promise<PhaseOutcome<T>> {
    const { runId, model, phaseTimeoutMs, logger } = this.options;
    const iteration = state.iteration;
    const phaseLogger = logger.child({ iteration, phase });

    await this.emit({ ...this.meta(), type: 'PhaseStarted', payload: { iteration, phase } });
    const start = this.clock();
    let settled = false;

    try {
      const value = await runWithTimeout(`${phase} phase`, phaseTimeoutMs, abortSignal, (signal) => {
        const work = fn({ runId, iteration, logger: phaseLogger, abortSignal: signal, model });
        void work.then(
          () => (settled = true),
          () => (settled = true),
        );
        return work;
      });
      return { ok: true, value, durationMs: this.clock() - start };
    } catch (error) {
      const durationMs = this.clock() - start;
      await this.emit({
        ...this.meta(),
        type: 'AdapterFailed',
        payload: {
          iteration,
          phase,
          error: errorMessage(error),
          code: error instanceof AppError ? error.code : undefined,
        },
      });
      await phaseLogger.warn(`${phase} failed: ${errorMessage(error)}`);
      return { ok: false, error, durationMs, abandoned: !settled };
    }
  }

  private async phaseFinished(
    state: LoopState,
    phase: LoopPhase,
    durationMs: number,
    summary: Record<string, number | string | boolean>,
  ): Promise<void> {
    await this.emit({
      ...this.meta(),
      type: 'PhaseFinished',
      payload: { iteration: state.iteration, phase, durationMs, summary },
    });
  }

  private async iterationFinished(state: LoopState): Promise<void> {
    await this.emit({
      ...this.meta(),
      type: 'IterationFinished',
      payload: {
        iteration: state.iteration,
        issues: planIssueCount(state.plan),
        filesModified: countModified(state.outcomes),
        verdictStatus: state.verdict?.status,
        verdictAction: state.verdict?.action,
      },
    });
  }

  private toResult(state: LoopState, tag: TerminalTag, message: string, finishedAt: number): LoopResult {
    const { stats } = state;
    return {
      tag,
      message,
      iterations: state.iteration,
      maxIterations: state.maxIterations,
      issuesFound: stats.issuesFound,
      filesModified: stats.filesModified,
      durationMs: elapsedMs(stats, finishedAt),
      phaseDurations: { ...stats.phaseDurations },
      startedAt: new Date(stats.startedAt).toISOString(),
      finishedAt: new Date(finishedAt).toISOString(),
      plan: state.plan,
      outcomes: state.outcomes,
      verdict: state.verdict,
    };
  }

  private meta() {
    return {
      schemaVersion: 1,
      timestamp: new Date().toISOString(),
      runId: this.options.runId,
    };
  }

  private async emit(event: MenderEvent): Promise<void> {
    await this.eventBus.emit(event);
  }
}
