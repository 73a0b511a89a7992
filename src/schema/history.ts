import { z } from 'zod';

import type { OperationResult, ParameterMap } from './operations.js';

// ── Failure taxonomy ─────────────────────────────────────────

export const invocationErrorKindSchema = z.enum([
  'selector_parse_failure',
  'unknown_operation',
  'pipeline_violation',
  'operation_failure',
  'oracle_failure',
]);

export type InvocationErrorKind = z.infer<typeof invocationErrorKindSchema>;

// ── Invocation records ───────────────────────────────────────

export type InvocationOutcome =
  | { status: 'success'; result: OperationResult; reused: boolean }
  | { status: 'error'; kind: InvocationErrorKind; message: string };

export interface InvocationRecord {
  /** Plan index the record was produced for. */
  readonly stepIndex: number;
  /** Null when the selector output never yielded a name. */
  readonly operation: string | null;
  readonly parameters: Readonly<ParameterMap>;
  readonly outcome: InvocationOutcome;
}

export type SuccessRecord = InvocationRecord & {
  readonly outcome: Extract<InvocationOutcome, { status: 'success' }>;
};

export type ErrorRecord = InvocationRecord & {
  readonly outcome: Extract<InvocationOutcome, { status: 'error' }>;
};

export function isSuccessRecord(record: InvocationRecord): record is SuccessRecord {
  return record.outcome.status === 'success';
}

export function isErrorRecord(record: InvocationRecord): record is ErrorRecord {
  return record.outcome.status === 'error';
}

export function errorRecord(
  stepIndex: number,
  kind: InvocationErrorKind,
  message: string,
  operation: string | null = null,
  parameters: ParameterMap = {},
): ErrorRecord {
  return {
    stepIndex,
    operation,
    parameters,
    outcome: { status: 'error', kind, message },
  };
}
