import { readFile } from 'node:fs/promises';

import { parse as parseYaml } from 'yaml';
import type { ZodError } from 'zod';

import { envConfigSchema, fileConfigSchema, runConfigSchema } from '../schema/config.js';
import type { EnvConfig, FileConfig, RunConfig } from '../schema/config.js';
import { DEFAULTS, LIMITS } from './defaults.js';

// ── Error ────────────────────────────────────────────────────

export class ConfigError extends Error {
  readonly exitCode = 2;

  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

function describeZodError(error: ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    .join('; ');
}

// ── Config file ──────────────────────────────────────────────

/**
 * Load and validate a `.decision-agent.yaml` (or JSON) config file.
 * When `required` is false a missing file yields an empty config.
 */
export async function loadConfigFile(
  configPath: string,
  required = true,
): Promise<FileConfig> {
  let raw: string;
  try {
    raw = await readFile(configPath, 'utf-8');
  } catch (err) {
    if (!required && err instanceof Error && 'code' in err && err.code === 'ENOENT') {
      return {};
    }
    const message = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`Cannot read config file ${configPath}: ${message}`);
  }

  let parsed: unknown;
  try {
    parsed = configPath.endsWith('.json') ? JSON.parse(raw) : parseYaml(raw);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`Config file ${configPath} is not valid: ${message}`);
  }

  // An empty YAML document parses to null
  const result = fileConfigSchema.safeParse(parsed ?? {});
  if (!result.success) {
    throw new ConfigError(`Config file ${configPath}: ${describeZodError(result.error)}`);
  }
  return result.data;
}

// ── Environment ──────────────────────────────────────────────

const ENV_KEYS = Object.keys(envConfigSchema.shape);

export function loadEnvConfig(env: NodeJS.ProcessEnv = process.env): EnvConfig {
  const present: Record<string, string> = {};
  for (const key of ENV_KEYS) {
    const value = env[key]?.trim();
    if (value) present[key] = value;
  }

  const result = envConfigSchema.safeParse(present);
  if (!result.success) {
    throw new ConfigError(`Environment: ${describeZodError(result.error)}`);
  }
  return result.data;
}

// ── Resolution ───────────────────────────────────────────────

export interface RunConfigOverrides {
  maxIterations?: number | undefined;
  verbose?: boolean | undefined;
}

/**
 * Merge config sources. Precedence: CLI override > config file > env > default.
 * The result is frozen: run settings do not change once a run starts.
 */
export function resolveRunConfig(
  file: FileConfig,
  env: EnvConfig,
  overrides: RunConfigOverrides = {},
): Readonly<RunConfig> {
  const provider = file.provider ?? env.LLM_PROVIDER ?? DEFAULTS.PROVIDER;
  const apiKey =
    provider === 'anthropic'
      ? env.ANTHROPIC_API_KEY
      : provider === 'openai'
        ? env.OPENAI_API_KEY
        : undefined;

  const result = runConfigSchema.safeParse({
    maxIterations:
      overrides.maxIterations ?? file.maxIterations ?? env.MAX_ITERATIONS ?? LIMITS.MAX_ITERATIONS,
    verbose: overrides.verbose ?? file.verbose ?? env.VERBOSE ?? DEFAULTS.VERBOSE,
    datasetPath: file.datasetPath ?? env.DATASET_PATH ?? DEFAULTS.DATASET_PATH,
    emptySearchPolicy:
      file.emptySearchPolicy ?? env.EMPTY_SEARCH_POLICY ?? DEFAULTS.EMPTY_SEARCH_POLICY,
    provider,
    model: file.model ?? env.LLM_MODEL,
    apiKey,
  });
  if (!result.success) {
    throw new ConfigError(describeZodError(result.error));
  }
  return Object.freeze(result.data);
}
