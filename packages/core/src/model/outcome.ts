import type { FixOutcome } from './types';

/** A modified resource is always reported as fixed. */
export function normalizeFixOutcome(outcome: FixOutcome): FixOutcome {
  const issuesAddressed = Math.max(0, Math.floor(outcome.issuesAddressed));
  const status =
    outcome.modified && outcome.status !== 'FIXED' && outcome.status !== 'FIXED_VIA_FALLBACK'
      ? 'FIXED'
      : outcome.status;
  return { ...outcome, issuesAddressed, status };
}

export function countModified(outcomes: readonly FixOutcome[]): number {
  return outcomes.filter((o) => o.modified).length;
}

export function errorOutcomes(resources: Iterable<string>, error: string): FixOutcome[] {
  return Array.from(resources, (resource) => ({
    resource,
    modified: false,
    issuesAddressed: 0,
    status: 'ERROR' as const,
    error,
  }));
}
