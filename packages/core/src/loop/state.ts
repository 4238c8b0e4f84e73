import { EMPTY_PLAN, planIssueCount } from '../model/plan';
import { countModified } from '../model/outcome';
import type { LoopState, PhaseResult } from './types';
import { addIssues, addModified, addPhaseDuration, createStatistics } from './statistics';

export function initialState(maxIterations: number, startedAt: number): LoopState {
  return {
    iteration: 0,
    maxIterations,
    plan: EMPTY_PLAN,
    outcomes: [],
    stats: createStatistics(startedAt),
  };
}

export function canBeginIteration(state: LoopState): boolean {
  return state.iteration < state.maxIterations;
}

export function beginIteration(state: LoopState): LoopState {
  if (!canBeginIteration(state)) {
    throw new Error(`Iteration ${state.iteration + 1} exceeds the limit of ${state.maxIterations}`);
  }
  return { ...state, iteration: state.iteration + 1 };
}

/**
 * Folds one phase result into the state. An audit starts a fresh plan and
 * clears the previous iteration's outcomes and verdict.
 */
export function reduce(state: LoopState, result: PhaseResult): LoopState {
  const stats = addPhaseDuration(state.stats, result.phase, result.durationMs);
  switch (result.phase) {
    case 'AUDIT':
      return {
        ...state,
        plan: result.plan,
        outcomes: [],
        verdict: undefined,
        stats: addIssues(stats, planIssueCount(result.plan)),
      };
    case 'FIX':
      return {
        ...state,
        outcomes: result.outcomes,
        stats: addModified(stats, countModified(result.outcomes)),
      };
    case 'JUDGE':
      return { ...state, verdict: result.verdict, stats };
  }
}
