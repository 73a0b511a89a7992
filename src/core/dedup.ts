import type { InvocationRecord, SuccessRecord } from '../schema/history.js';
import { isSuccessRecord } from '../schema/history.js';
import type { ParameterMap } from '../schema/operations.js';

// ── Canonical form ───────────────────────────────────────────

export type Canonical =
  | null
  | boolean
  | number
  | string
  | Canonical[]
  | { [key: string]: Canonical };

/**
 * Order-independent form of a parameter value: object keys sorted,
 * list items sorted by their JSON text. Two values with the same
 * canonical form are treated as the same request.
 */
export function canonicalize(value: unknown): Canonical {
  if (value === null || value === undefined) return null;
  if (typeof value === 'string' || typeof value === 'boolean') return value;
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;

  if (Array.isArray(value)) {
    return value
      .map((item) => canonicalize(item))
      .map((item) => ({ item, text: JSON.stringify(item) }))
      .sort((a, b) => (a.text < b.text ? -1 : a.text > b.text ? 1 : 0))
      .map(({ item }) => item);
  }

  if (typeof value === 'object') {
    const out: { [key: string]: Canonical } = {};
    for (const key of Object.keys(value).sort()) {
      const entry: unknown = Reflect.get(value, key);
      if (entry !== undefined) out[key] = canonicalize(entry);
    }
    return out;
  }

  return String(value);
}

export function invocationKey(operation: string, parameters: Readonly<ParameterMap>): string {
  return `${operation}:${JSON.stringify(canonicalize(parameters))}`;
}

// ── Lookup ───────────────────────────────────────────────────

/** Most recent successful record for an equivalent call, if any. */
export function findReusable(
  history: readonly InvocationRecord[],
  operation: string,
  parameters: Readonly<ParameterMap>,
): SuccessRecord | undefined {
  const key = invocationKey(operation, parameters);
  for (let i = history.length - 1; i >= 0; i--) {
    const record = history[i];
    if (record === undefined || !isSuccessRecord(record) || record.operation === null) continue;
    if (invocationKey(record.operation, record.parameters) === key) return record;
  }
  return undefined;
}
