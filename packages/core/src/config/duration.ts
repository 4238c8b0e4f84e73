import { UsageError } from '@mender/shared';

const UNIT_MS = { ms: 1, s: 1000, m: 60_000, h: 3_600_000 } as const;
const DURATION = /^(\d+(?:\.\d+)?)(ms|s|m|h)?$/;

/**
 * Parses `500ms`, `30s`, `10m` or `1h` into milliseconds. A bare number is
 * taken as milliseconds.
 */
export function parseDuration(value: string): number {
  const match = DURATION.exec(value.trim());
  if (!match) {
    throw new UsageError(`Invalid duration '${value}'. Use a number with ms, s, m or h.`);
  }
  const unit = match[2] === 'ms' || match[2] === 's' || match[2] === 'm' || match[2] === 'h' ? match[2] : 'ms';
  const ms = Math.round(Number(match[1]) * UNIT_MS[unit]);
  if (ms <= 0) {
    throw new UsageError(`Duration must be positive: '${value}'`);
  }
  return ms;
}
