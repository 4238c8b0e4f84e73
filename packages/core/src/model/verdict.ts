import { z } from 'zod';
import { isRecord } from '@mender/shared';
import { VERDICT_ACTIONS, VERDICT_STATUSES, type Verdict } from './types';

const upper = (value: string) => value.trim().toUpperCase();

const countSchema = z.coerce.number().int().nonnegative().catch(0);
const optionalText = z.string().optional().catch(undefined);

const rawVerdictSchema = z.object({
  status: z.string().transform(upper).pipe(z.enum(VERDICT_STATUSES)).catch('FAIL_UNCERTAIN'),
  action: z
    .string()
    .transform(upper)
    // Older judges still answer RETURN_TO_FIXER
    .transform((a) => (a === 'RETURN_TO_FIXER' ? 'RETURN_TO_AUDIT' : a))
    .pipe(z.enum(VERDICT_ACTIONS))
    .catch('REQUIRE_HUMAN'),
  passed: countSchema,
  failed: countSchema,
  allPassed: z.boolean().optional().catch(undefined),
  reason: optionalText,
  root_cause: optionalText,
});

/**
 * Coerces a judge answer into a Verdict. Missing or unknown fields fall back
 * to an uncertain verdict that asks for a human. `total` is always recomputed
 * and `allPassed` never holds while something failed.
 */
export function normalizeVerdict(raw: unknown): Verdict {
  const data = rawVerdictSchema.parse(isRecord(raw) ? raw : {});
  const allPassed = (data.allPassed ?? data.status === 'PASS') && data.failed === 0;
  return {
    allPassed,
    total: data.passed + data.failed,
    passed: data.passed,
    failed: data.failed,
    status: data.status,
    action: data.action,
    reason: data.reason ?? data.root_cause ?? '',
  };
}

export function uncertainVerdict(reason: string): Verdict {
  return {
    allPassed: false,
    total: 0,
    passed: 0,
    failed: 0,
    status: 'FAIL_UNCERTAIN',
    action: 'REQUIRE_HUMAN',
    reason,
  };
}
