import { describe, it, expect } from 'vitest';
import { detectAfterAudit, detectAfterJudge } from './detector';
import { initialState } from './state';
import { createPlan } from '../model/plan';
import type { FixOutcome, Verdict } from '../model/types';
import type { LoopState } from './types';

const plan = createPlan([
  ['a.py', [{ location: { resource: 'a.py', line: 2 }, category: 'BUG', severity: 'LOW', description: 'd' }]],
]);
const modified: FixOutcome = { resource: 'a.py', modified: true, issuesAddressed: 1, status: 'FIXED' };

function stateWith(overrides: Partial<LoopState>): LoopState {
  return { ...initialState(3, 0), iteration: 1, plan, outcomes: [modified], ...overrides };
}

function verdict(overrides: Partial<Verdict>): Verdict {
  return {
    allPassed: false,
    total: 1,
    passed: 0,
    failed: 1,
    status: 'FAIL_FIXABLE',
    action: 'RETURN_TO_AUDIT',
    reason: '',
    ...overrides,
  };
}

describe('detectAfterAudit', () => {
  it('stops with SUCCESS on an empty plan', () => {
    expect(detectAfterAudit(stateWith({ plan: new Map() }))).toEqual({
      kind: 'stop',
      tag: 'SUCCESS',
      reason: 'No issues found',
    });
    expect(detectAfterAudit(stateWith({ plan: new Map(), iteration: 3 }))).toEqual({
      kind: 'stop',
      tag: 'SUCCESS',
      reason: 'No issues remain after 3 iterations',
    });
  });

  it('continues while issues remain', () => {
    expect(detectAfterAudit(stateWith({}))).toEqual({ kind: 'continue' });
  });
});

describe('detectAfterJudge', () => {
  it('escalates before anything else', () => {
    const state = stateWith({
      iteration: 3,
      outcomes: [],
      verdict: verdict({ allPassed: true, failed: 0, action: 'REQUIRE_HUMAN' }),
    });
    expect(detectAfterJudge(state)).toMatchObject({ tag: 'NEEDS_HUMAN', reason: 'Human review required' });
  });

  it('honours a judge STOP before the budget', () => {
    const state = stateWith({
      iteration: 3,
      verdict: verdict({ allPassed: true, failed: 0, status: 'PASS', action: 'STOP' }),
    });
    expect(detectAfterJudge(state)).toMatchObject({ tag: 'SUCCESS' });
  });

  it('checks the budget before the stall', () => {
    const state = stateWith({ iteration: 3, outcomes: [], verdict: verdict({}) });
    expect(detectAfterJudge(state)).toMatchObject({ tag: 'MAX_ITERATIONS' });
  });

  it('detects a stall', () => {
    const state = stateWith({ outcomes: [{ ...modified, modified: false, status: 'NO_CHANGE' }], verdict: verdict({}) });
    expect(detectAfterJudge(state)).toMatchObject({ tag: 'PARTIAL' });
  });

  it('continues while files change', () => {
    expect(detectAfterJudge(stateWith({ verdict: verdict({}) }))).toEqual({ kind: 'continue' });
  });
});
