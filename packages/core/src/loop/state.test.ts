import { describe, it, expect } from 'vitest';
import { beginIteration, canBeginIteration, initialState, reduce } from './state';
import { createPlan } from '../model/plan';
import { uncertainVerdict } from '../model/verdict';

const plan = createPlan([
  [
    'a.py',
    [
      { location: { resource: 'a.py', line: 1 }, category: 'BUG', severity: 'LOW', description: 'one' },
      { location: { resource: 'a.py', line: 2 }, category: 'DOC', severity: 'LOW', description: 'two' },
    ],
  ],
]);

describe('loop state', () => {
  it('starts at iteration zero with empty statistics', () => {
    const state = initialState(2, 500);
    expect(state).toEqual({
      iteration: 0,
      maxIterations: 2,
      plan: new Map(),
      outcomes: [],
      stats: { issuesFound: 0, filesModified: 0, startedAt: 500, phaseDurations: { AUDIT: 0, FIX: 0, JUDGE: 0 } },
    });
  });

  it('refuses to begin an iteration past the limit', () => {
    const state = beginIteration(beginIteration(initialState(2, 0)));
    expect(state.iteration).toBe(2);
    expect(canBeginIteration(state)).toBe(false);
    expect(() => beginIteration(state)).toThrow('Iteration 3 exceeds the limit of 2');
  });

  it('folds phase results without mutating the previous state', () => {
    const start = beginIteration(initialState(3, 0));
    const audited = reduce(start, { phase: 'AUDIT', plan, durationMs: 10 });
    const fixedState = reduce(audited, {
      phase: 'FIX',
      outcomes: [{ resource: 'a.py', modified: true, issuesAddressed: 2, status: 'FIXED' }],
      durationMs: 20,
    });
    const judged = reduce(fixedState, { phase: 'JUDGE', verdict: uncertainVerdict('x'), durationMs: 5 });

    expect(start.stats.issuesFound).toBe(0);
    expect(audited.stats).toMatchObject({ issuesFound: 2, filesModified: 0 });
    expect(judged.stats).toMatchObject({
      issuesFound: 2,
      filesModified: 1,
      phaseDurations: { AUDIT: 10, FIX: 20, JUDGE: 5 },
    });
    expect(judged.verdict?.status).toBe('FAIL_UNCERTAIN');
  });

  it('clears outcomes and verdict when a new audit arrives', () => {
    let state = beginIteration(initialState(3, 0));
    state = reduce(state, { phase: 'AUDIT', plan, durationMs: 1 });
    state = reduce(state, { phase: 'JUDGE', verdict: uncertainVerdict('x'), durationMs: 1 });
    state = reduce(beginIteration(state), { phase: 'AUDIT', plan, durationMs: 1 });

    expect(state.verdict).toBeUndefined();
    expect(state.outcomes).toEqual([]);
    expect(state.stats.issuesFound).toBe(4);
  });
});
