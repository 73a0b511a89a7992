/**
 * Default configuration values.
 * All values are overridable via env, config file or CLI flag.
 */

export const LIMITS = {
  MAX_ITERATIONS: 10,
  MIN_PLAN_STEPS: 2,
  MAX_PLAN_STEPS: 5,
  DEFAULT_SEARCH_LIMIT: 10,
  DEFAULT_TOP_N: 5,
} as const;

export const TOKEN_GUARDS = {
  MAX_RESULT_CHARS: 3_000,
  MAX_CATEGORY_HINT_CHARS: 40,
  RESULT_PREVIEW_CHARS: 200,
  MAX_EXCERPT_CHARS: 150,
} as const;

export const DEFAULTS = {
  PROVIDER: 'anthropic',
  VERBOSE: true,
  DATASET_PATH: 'data/products.csv',
  CONFIG_PATH: '.decision-agent.yaml',
  EMPTY_SEARCH_POLICY: 'continue',
} as const;

export const APOLOGY_ANSWER = 'Unable to generate a response. Please try again.';

/** Sampling settings shared by every provider. */
export const ORACLE = {
  maxTokens: 4_096,
  temperature: 0,
} as const;
