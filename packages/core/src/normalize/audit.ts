import { errorMessage, extractFirstJsonObject, isRecord } from '@mender/shared';
import { normalizeIssues } from '../model/issue';
import type { Issue } from '../model/types';

export type ParseResult =
  | { kind: 'structured'; issues: Issue[] }
  | { kind: 'fallback'; issues: Issue[] }
  | { kind: 'empty'; issues: [] };

/** Structured answers are complete; anything recovered from prose is partial. */
export function parseStatus(result: ParseResult): 'OK' | 'PARTIAL' {
  return result.kind === 'structured' ? 'OK' : 'PARTIAL';
}

const LIST_ITEM = /^\s*(?:[-*•]|\d+[.)])\s+(.+?)\s*$/;

function hasIssueList(value: unknown): value is { issues: unknown[] } {
  return isRecord(value) && Array.isArray(value.issues);
}

function listItems(text: string): string[] {
  const items: string[] = [];
  for (const line of text.split(/\r?\n/)) {
    const match = LIST_ITEM.exec(line);
    if (match) items.push(match[1]);
  }
  return items;
}

/**
 * Reads an auditor answer for one resource.
 *
 * The first JSON object carrying an `issues` array wins. Without one, list
 * items (`-`, `*`, `•`, `1.`) are kept as free-text issues.
 */
export function parseAuditResponse(text: string, resource: string): ParseResult {
  const json = extractFirstJsonObject(text, hasIssueList);
  if (hasIssueList(json)) {
    return { kind: 'structured', issues: normalizeIssues(json.issues, resource) };
  }

  const fallback = normalizeIssues(listItems(text), resource);
  if (fallback.length > 0) {
    return { kind: 'fallback', issues: fallback };
  }
  return { kind: 'empty', issues: [] };
}

export interface AuditNormalization {
  result: ParseResult;
  remediated: boolean;
  remediationError?: string;
}

/**
 * Parses an auditor answer and, when it looks like broken JSON, asks once for
 * a strict-JSON rewrite through `reformat`. If the rewrite does not parse
 * either, the first answer's fallback result stands.
 */
export async function normalizeWithRemediation(
  text: string,
  resource: string,
  reformat: (text: string) => Promise<string>,
): Promise<AuditNormalization> {
  const first = parseAuditResponse(text, resource);
  if (first.kind === 'structured' || !text.includes('{')) {
    return { result: first, remediated: false };
  }

  let rewritten: string;
  try {
    rewritten = await reformat(text);
  } catch (error) {
    return { result: first, remediated: false, remediationError: errorMessage(error) };
  }

  const second = parseAuditResponse(rewritten, resource);
  if (second.kind === 'structured') {
    return { result: second, remediated: true };
  }
  return {
    result: first,
    remediated: false,
    remediationError: 'Reformatted response contained no issues object',
  };
}
