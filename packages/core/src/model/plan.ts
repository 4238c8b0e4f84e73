import type { Issue, Plan } from './types';
import { normalizeIssues } from './issue';

export const EMPTY_PLAN: Plan = new Map();

/**
 * Builds a plan from resource/issue pairs. Resources without issues are left
 * out, and a resource listed twice has its issues appended in order.
 */
export function createPlan(entries: Iterable<readonly [string, readonly Issue[]]>): Plan {
  const plan = new Map<string, Issue[]>();
  for (const [resource, issues] of entries) {
    if (issues.length === 0) continue;
    const existing = plan.get(resource);
    if (existing) {
      existing.push(...issues);
    } else {
      plan.set(resource, [...issues]);
    }
  }
  return plan;
}

export function planIssueCount(plan: Plan): number {
  let count = 0;
  for (const issues of plan.values()) count += issues.length;
  return count;
}

export function isEmptyPlan(plan: Plan): boolean {
  return planIssueCount(plan) === 0;
}

/** Re-normalizes every issue under its key. Canonical plans come back equal. */
export function normalizePlan(plan: Plan): Plan {
  return createPlan(
    Array.from(plan, ([resource, issues]) => [resource, normalizeIssues(issues, resource)] as const),
  );
}
