import { z } from 'zod';

// ── Shared enums ─────────────────────────────────────────────

export const llmProviderSchema = z.enum(['anthropic', 'openai', 'mock']);

export type LLMProvider = z.infer<typeof llmProviderSchema>;

/**
 * What downstream operations do when the pipeline search returned a
 * structured but empty match set.
 * - `continue`: run against the empty product list (a "no data" result)
 * - `halt`: record a pipeline violation and stop the loop
 */
export const emptySearchPolicySchema = z.enum(['continue', 'halt']);

export type EmptySearchPolicy = z.infer<typeof emptySearchPolicySchema>;

// ── Config file ──────────────────────────────────────────────

export const fileConfigSchema = z
  .object({
    maxIterations: z.number().int().positive().optional(),
    verbose: z.boolean().optional(),
    datasetPath: z.string().min(1).optional(),
    emptySearchPolicy: emptySearchPolicySchema.optional(),
    provider: llmProviderSchema.optional(),
    model: z.string().min(1).optional(),
  })
  .strict();

export type FileConfig = z.infer<typeof fileConfigSchema>;

// ── Environment ──────────────────────────────────────────────

const booleanFlag = z
  .enum(['true', 'false', '1', '0', 'yes', 'no'])
  .transform((v) => v === 'true' || v === '1' || v === 'yes');

export const envConfigSchema = z.object({
  LLM_PROVIDER: llmProviderSchema.optional(),
  ANTHROPIC_API_KEY: z.string().min(1).optional(),
  OPENAI_API_KEY: z.string().min(1).optional(),
  LLM_MODEL: z.string().min(1).optional(),
  MAX_ITERATIONS: z.coerce.number().int().positive().optional(),
  VERBOSE: booleanFlag.optional(),
  DATASET_PATH: z.string().min(1).optional(),
  EMPTY_SEARCH_POLICY: emptySearchPolicySchema.optional(),
});

export type EnvConfig = z.infer<typeof envConfigSchema>;

// ── Resolved run configuration ───────────────────────────────

export const runConfigSchema = z.object({
  maxIterations: z.number().int().positive(),
  verbose: z.boolean(),
  datasetPath: z.string().min(1),
  emptySearchPolicy: emptySearchPolicySchema,
  provider: llmProviderSchema,
  model: z.string().min(1).optional(),
  apiKey: z.string().min(1).optional(),
});

export type RunConfig = z.infer<typeof runConfigSchema>;
