import { isRecord } from '@mender/shared';
import { ISSUE_CATEGORIES, SEVERITIES, type Issue, type IssueCategory, type Severity } from './types';

const DESCRIPTION_KEYS = ['description', 'message', 'issue', 'title'];
const FIX_KEYS = ['fixInstruction', 'fix_instruction', 'fix', 'suggestion'];
const CATEGORY_KEYS = ['category', 'type'];
const SEVERITY_KEYS = ['severity', 'priority'];

function pickString(record: Record<string, unknown>, keys: readonly string[]): string | undefined {
  for (const key of keys) {
    const value = record[key];
    if (typeof value === 'string' && value.trim() !== '') return value.trim();
  }
  return undefined;
}

export function normalizeCategory(value: unknown): IssueCategory {
  if (typeof value !== 'string') return 'UNKNOWN';
  const upper = value.trim().toUpperCase();
  return ISSUE_CATEGORIES.find((c) => c === upper) ?? 'UNKNOWN';
}

export function normalizeSeverity(value: unknown): Severity {
  if (typeof value !== 'string') return 'LOW';
  const upper = value.trim().toUpperCase();
  return SEVERITIES.find((s) => s === upper) ?? 'LOW';
}

export function normalizeLine(value: unknown): number {
  const n = typeof value === 'string' ? Number(value.trim()) : value;
  if (typeof n !== 'number' || !Number.isFinite(n) || n < 0) return 0;
  return Math.floor(n);
}

function readLine(record: Record<string, unknown>): unknown {
  if (record.line !== undefined) return record.line;
  return isRecord(record.location) ? record.location.line : undefined;
}

/**
 * Coerces one loosely shaped issue into an Issue owned by `resource`.
 *
 * Plain strings become UNKNOWN/LOW issues. Unknown categories and severities
 * are mapped to their defaults; only a missing description drops the issue.
 */
export function normalizeIssue(raw: unknown, resource: string): Issue | undefined {
  if (typeof raw === 'string') {
    const description = raw.trim();
    if (!description) return undefined;
    return {
      location: { resource, line: 0 },
      category: 'UNKNOWN',
      severity: 'LOW',
      description,
    };
  }
  if (!isRecord(raw)) return undefined;

  const description = pickString(raw, DESCRIPTION_KEYS);
  if (!description) return undefined;

  const issue: Issue = {
    location: { resource, line: normalizeLine(readLine(raw)) },
    category: normalizeCategory(pickString(raw, CATEGORY_KEYS)),
    severity: normalizeSeverity(pickString(raw, SEVERITY_KEYS)),
    description,
  };
  const fixInstruction = pickString(raw, FIX_KEYS);
  if (fixInstruction) issue.fixInstruction = fixInstruction;
  return issue;
}

export function normalizeIssues(raw: readonly unknown[], resource: string): Issue[] {
  const issues: Issue[] = [];
  for (const item of raw) {
    const issue = normalizeIssue(item, resource);
    if (issue) issues.push(issue);
  }
  return issues;
}
