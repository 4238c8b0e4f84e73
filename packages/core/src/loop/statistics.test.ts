import { describe, it, expect } from 'vitest';
import { addIssues, addModified, addPhaseDuration, createStatistics, elapsedMs } from './statistics';

describe('statistics', () => {
  it('never decreases counters', () => {
    let stats = createStatistics(0);
    stats = addIssues(stats, 3);
    stats = addIssues(stats, -5);
    stats = addModified(stats, 2);
    stats = addModified(stats, -1);

    expect(stats.issuesFound).toBe(3);
    expect(stats.filesModified).toBe(2);
  });

  it('sums phase durations', () => {
    let stats = createStatistics(0);
    stats = addPhaseDuration(stats, 'FIX', 40);
    stats = addPhaseDuration(stats, 'FIX', 2);
    expect(stats.phaseDurations).toEqual({ AUDIT: 0, FIX: 42, JUDGE: 0 });
  });

  it('computes wall-clock time from the start', () => {
    expect(elapsedMs(createStatistics(1000), 1750)).toBe(750);
    expect(elapsedMs(createStatistics(1000), 900)).toBe(0);
  });
});
