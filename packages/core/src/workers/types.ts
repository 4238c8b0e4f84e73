import type { Logger } from '@mender/shared';
import type { FixOutcome, Plan, Verdict } from '../model/types';

/** Read-only context handed to every worker call. */
export interface WorkerContext {
  runId: string;
  iteration: number;
  logger: Logger;
  abortSignal: AbortSignal;
  /** Opaque provider selector from the run configuration */
  model?: string;
}

export interface Auditor {
  /** Returns an empty plan for resources it cannot analyse. */
  audit(resources: readonly string[], ctx: WorkerContext): Promise<Plan>;
}

export interface Fixer {
  /**
   * Rewrites planned resources in place.
   *
   * @throws {SandboxViolationError} when a resource resolves outside the target root
   */
  fix(resources: readonly string[], plan: Plan, ctx: WorkerContext): Promise<FixOutcome[]>;
}

export interface Judge {
  judge(resources: readonly string[], ctx: WorkerContext): Promise<Verdict>;
}
