export const ISSUE_CATEGORIES = ['SYNTAX', 'STYLE', 'DESIGN', 'DOC', 'BUG', 'UNKNOWN'] as const;
export type IssueCategory = (typeof ISSUE_CATEGORIES)[number];

export const SEVERITIES = ['CRITICAL', 'HIGH', 'MEDIUM', 'LOW'] as const;
export type Severity = (typeof SEVERITIES)[number];

export interface IssueLocation {
  resource: string;
  /** 1-based line; 0 means the whole file */
  line: number;
}

export interface Issue {
  location: IssueLocation;
  category: IssueCategory;
  severity: Severity;
  description: string;
  fixInstruction?: string;
}

/**
 * Issues keyed by resource, in the order resources were audited.
 * Every key has at least one issue; an empty plan means nothing was found.
 */
export type Plan = ReadonlyMap<string, readonly Issue[]>;

export const FIX_STATUSES = ['FIXED', 'FIXED_VIA_FALLBACK', 'NO_CHANGE', 'ERROR'] as const;
export type FixStatus = (typeof FIX_STATUSES)[number];

export interface FixOutcome {
  resource: string;
  modified: boolean;
  issuesAddressed: number;
  status: FixStatus;
  error?: string;
}

export const VERDICT_STATUSES = ['PASS', 'FAIL_FIXABLE', 'FAIL_UNCERTAIN', 'ERROR'] as const;
export type VerdictStatus = (typeof VERDICT_STATUSES)[number];

export const VERDICT_ACTIONS = ['STOP', 'RETURN_TO_AUDIT', 'REQUIRE_HUMAN'] as const;
export type VerdictAction = (typeof VERDICT_ACTIONS)[number];

export interface Verdict {
  allPassed: boolean;
  total: number;
  passed: number;
  failed: number;
  status: VerdictStatus;
  action: VerdictAction;
  reason: string;
}
