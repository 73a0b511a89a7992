// ── Tagged oracle parse ──────────────────────────────────────
// The oracle answers in free text that may embed JSON. Callers branch on
// `kind` instead of scanning text themselves.

export type OracleParse =
  | { kind: 'parsed'; value: Record<string, unknown> }
  | { kind: 'unparseable'; raw: string; reason: string };

export function parseOracleJson(raw: string): OracleParse {
  const candidate = extractFirstObject(raw);
  if (candidate === null) {
    return { kind: 'unparseable', raw, reason: 'No JSON object found in response' };
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(candidate);
  } catch (e) {
    const message = e instanceof Error ? e.message : String(e);
    return { kind: 'unparseable', raw, reason: `Invalid JSON: ${message}` };
  }

  if (!isPlainObject(parsed)) {
    return { kind: 'unparseable', raw, reason: 'JSON value is not an object' };
  }
  return { kind: 'parsed', value: parsed };
}

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// ── Balanced-brace extraction ────────────────────────────────

/**
 * Return the first `{…}` span whose braces balance, ignoring braces
 * inside JSON string literals. Null when no span balances.
 */
export function extractFirstObject(raw: string): string | null {
  let start = raw.indexOf('{');
  while (start !== -1) {
    const end = findClosingBrace(raw, start);
    if (end !== -1) return raw.slice(start, end + 1);
    start = raw.indexOf('{', start + 1);
  }
  return null;
}

function findClosingBrace(text: string, start: number): number {
  let depth = 0;
  let inString = false;
  let escaped = false;

  for (let i = start; i < text.length; i++) {
    const ch = text[i];

    if (inString) {
      if (escaped) escaped = false;
      else if (ch === '\\') escaped = true;
      else if (ch === '"') inString = false;
      continue;
    }

    if (ch === '"') inString = true;
    else if (ch === '{') depth++;
    else if (ch === '}') {
      depth--;
      if (depth === 0) return i;
    }
  }
  return -1;
}

// ── Array extraction ─────────────────────────────────────────

export function extractJSONArray(raw: string): string | null {
  // Strip markdown fences if present
  const fenced = /```(?:json)?\s*\n?([\s\S]*?)```/.exec(raw);
  const body = fenced?.[1] ?? raw;

  // Find outermost array brackets
  const start = body.indexOf('[');
  const end = body.lastIndexOf(']');
  if (start !== -1 && end > start) return body.slice(start, end + 1);

  return null;
}
