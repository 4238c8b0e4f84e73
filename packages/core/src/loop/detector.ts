import { isEmptyPlan, planIssueCount } from '../model/plan';
import { countModified } from '../model/outcome';
import type { Decision, LoopState } from './types';

const CONTINUE: Decision = { kind: 'continue' };

/** Rule 1: runs right after the audit. */
export function detectAfterAudit(state: LoopState): Decision {
  if (isEmptyPlan(state.plan)) {
    return {
      kind: 'stop',
      tag: 'SUCCESS',
      reason:
        state.iteration === 1
          ? 'No issues found'
          : `No issues remain after ${state.iteration} iterations`,
    };
  }
  return CONTINUE;
}

/**
 * Rules 2-6, evaluated in order once the judge has answered:
 * human escalation, judge stop, iteration budget, stall, continue.
 */
export function detectAfterJudge(state: LoopState): Decision {
  const { verdict } = state;

  if (verdict?.action === 'REQUIRE_HUMAN') {
    return {
      kind: 'stop',
      tag: 'NEEDS_HUMAN',
      reason: verdict.reason ? `Human review required: ${verdict.reason}` : 'Human review required',
    };
  }

  if (verdict?.action === 'STOP') {
    if (verdict.allPassed) {
      return { kind: 'stop', tag: 'SUCCESS', reason: 'All tests passed' };
    }
    return {
      kind: 'stop',
      tag: 'STOPPED',
      reason: verdict.reason ? `Judge stopped the loop: ${verdict.reason}` : 'Judge stopped the loop',
    };
  }

  if (state.iteration >= state.maxIterations) {
    return {
      kind: 'stop',
      tag: 'MAX_ITERATIONS',
      reason: `Reached the iteration limit (${state.maxIterations})`,
    };
  }

  if (countModified(state.outcomes) === 0 && !isEmptyPlan(state.plan)) {
    return {
      kind: 'stop',
      tag: 'PARTIAL',
      reason: `No files were modified while ${planIssueCount(state.plan)} issue(s) remain`,
    };
  }

  return CONTINUE;
}
