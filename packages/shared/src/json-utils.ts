const CODE_FENCE = /```(?:json)?\s*([\s\S]*?)```/i;

function stripCodeFence(text: string): string {
  const fence = text.match(CODE_FENCE);
  return (fence?.[1] ?? text).trim();
}

/**
 * Pairs every `{` with the `}` that closes it in one pass and returns the
 * pairs ordered by opening offset. Braces inside string literals are not
 * counted. A raw newline ends a string, since JSON strings cannot span lines.
 */
function closedObjects(s: string): Array<[number, number]> {
  const open: number[] = [];
  const pairs: Array<[number, number]> = [];
  let inStr = false;
  let esc = false;

  for (let i = 0; i < s.length; i++) {
    const ch = s[i];

    if (inStr) {
      if (esc) {
        esc = false;
      } else if (ch === '\\') {
        esc = true;
      } else if (ch === '"' || ch === '\n') {
        inStr = false;
      }
      continue;
    }

    if (ch === '"' && open.length > 0) {
      inStr = true;
    } else if (ch === '{') {
      open.push(i);
    } else if (ch === '}') {
      const start = open.pop();
      if (start !== undefined) pairs.push([start, i]);
    }
  }

  return pairs.sort((x, y) => x[0] - y[0]);
}

type Parsed = { ok: true; value: unknown } | { ok: false };

function tryParse(candidate: string): Parsed {
  try {
    return { ok: true, value: JSON.parse(candidate) };
  } catch {
    return { ok: false };
  }
}

function scan(s: string, accept: (value: unknown) => boolean): unknown {
  for (const [start, end] of closedObjects(s)) {
    // Not JSON, or rejected: move on to the next brace
    const parsed = tryParse(s.slice(start, end + 1));
    if (parsed.ok && accept(parsed.value)) return parsed.value;
  }
  return undefined;
}

/**
 * Finds the first complete, parseable JSON object in free-form model output.
 *
 * A fenced ```json block is tried first, then the raw text. Objects that fail
 * to parse, or that `accept` rejects, are skipped and scanning resumes at the
 * next `{`, which also visits objects nested inside a rejected one.
 *
 * @returns the parsed object, or undefined when none qualifies
 */
export function extractFirstJsonObject(
  text: string,
  accept: (value: unknown) => boolean = () => true,
): unknown {
  const fenced = stripCodeFence(text);
  const found = scan(fenced, accept);
  if (found !== undefined || fenced === text.trim()) return found;
  return scan(text, accept);
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
