import { z } from 'zod';

import { invocationErrorKindSchema } from './history.js';

// ── Version ─────────────────────────────────────────────────
// Bump this when the contract changes.

export const JSON_OUTPUT_VERSION = '1.0' as const;

// ── Invocation output ───────────────────────────────────────

export const jsonOutputInvocationSchema = z.object({
  index: z.number().int().nonnegative(),
  stepIndex: z.number().int().nonnegative(),
  operation: z.string().nullable(),
  parameters: z.record(z.unknown()),
  status: z.enum(['success', 'error']),
  reused: z.boolean(),
  errorKind: invocationErrorKindSchema.nullable(),
  /** Result summary on success, error message otherwise. */
  message: z.string(),
  matchCount: z.number().int().nonnegative(),
});

export type JsonOutputInvocation = z.infer<typeof jsonOutputInvocationSchema>;

// ── Root output ─────────────────────────────────────────────

export const jsonOutputSchema = z.object({
  version: z.literal(JSON_OUTPUT_VERSION),
  runId: z.string().min(1),
  goal: z.string(),
  plan: z.array(z.string()),
  stepIndex: z.number().int().nonnegative(),
  iterations: z.number().int().nonnegative(),
  stopReason: z.enum(['iteration_ceiling', 'error', 'plan_complete']),
  transitions: z.array(z.string()),
  invocations: z.array(jsonOutputInvocationSchema),
  finalAnswer: z.string(),
  startedAt: z.string(),
  finishedAt: z.string(),
  durationMs: z.number().int().nonnegative(),
});

export type JsonOutput = z.infer<typeof jsonOutputSchema>;
