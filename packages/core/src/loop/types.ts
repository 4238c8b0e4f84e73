import type { LoopPhase } from '@mender/shared';
import type { FixOutcome, Plan, Verdict } from '../model/types';

export const TERMINAL_TAGS = [
  'SUCCESS',
  'PARTIAL',
  'NEEDS_HUMAN',
  'STOPPED',
  'MAX_ITERATIONS',
  'ERROR',
  'CANCELLED',
] as const;
export type TerminalTag = (typeof TERMINAL_TAGS)[number];

export type PhaseDurations = Record<LoopPhase, number>;

export interface LoopStatistics {
  issuesFound: number;
  filesModified: number;
  /** Epoch milliseconds */
  startedAt: number;
  phaseDurations: PhaseDurations;
}

export interface LoopState {
  readonly iteration: number;
  readonly maxIterations: number;
  readonly plan: Plan;
  readonly outcomes: readonly FixOutcome[];
  readonly verdict?: Verdict;
  readonly stats: Readonly<LoopStatistics>;
}

export type PhaseResult =
  | { phase: 'AUDIT'; plan: Plan; durationMs: number }
  | { phase: 'FIX'; outcomes: readonly FixOutcome[]; durationMs: number }
  | { phase: 'JUDGE'; verdict: Verdict; durationMs: number };

export type Decision = { kind: 'continue' } | { kind: 'stop'; tag: TerminalTag; reason: string };

export interface LoopResult {
  tag: TerminalTag;
  message: string;
  iterations: number;
  maxIterations: number;
  issuesFound: number;
  filesModified: number;
  durationMs: number;
  phaseDurations: PhaseDurations;
  /** ISO timestamps */
  startedAt: string;
  finishedAt: string;
  plan: Plan;
  outcomes: readonly FixOutcome[];
  verdict?: Verdict;
}
