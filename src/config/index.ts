/**
 * Configuration module.
 * Loads and validates runtime config from env, CLI flags, and config files.
 * Zod-validated; the resolved config is frozen for the run.
 */

export { LIMITS, TOKEN_GUARDS, DEFAULTS, ORACLE, APOLOGY_ANSWER } from './defaults.js';
export {
  ConfigError,
  loadConfigFile,
  loadEnvConfig,
  resolveRunConfig,
} from './loader.js';
export type { RunConfigOverrides } from './loader.js';
