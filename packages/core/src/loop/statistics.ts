import type { LoopPhase } from '@mender/shared';
import type { LoopStatistics } from './types';

export function createStatistics(startedAt: number): LoopStatistics {
  return {
    issuesFound: 0,
    filesModified: 0,
    startedAt,
    phaseDurations: { AUDIT: 0, FIX: 0, JUDGE: 0 },
  };
}

// Counters only grow: negative inputs count as zero.
const increment = (n: number) => Math.max(0, n);

export function addIssues(stats: LoopStatistics, count: number): LoopStatistics {
  return { ...stats, issuesFound: stats.issuesFound + increment(count) };
}

export function addModified(stats: LoopStatistics, count: number): LoopStatistics {
  return { ...stats, filesModified: stats.filesModified + increment(count) };
}

export function addPhaseDuration(
  stats: LoopStatistics,
  phase: LoopPhase,
  durationMs: number,
): LoopStatistics {
  return {
    ...stats,
    phaseDurations: {
      ...stats.phaseDurations,
      [phase]: stats.phaseDurations[phase] + increment(durationMs),
    },
  };
}

export function elapsedMs(stats: LoopStatistics, now: number): number {
  return Math.max(0, now - stats.startedAt);
}
