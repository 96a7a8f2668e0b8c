/**
 * Configuration module.
 * Loads and validates runtime config from env, CLI flags, and config files.
 * Zod-validated.
 */

export {
  TIMEOUTS,
  LIMITS,
  HUMAN_TIMING,
  VIEWPORT,
  RUN_DEFAULTS,
  LLM_DEFAULTS,
} from './defaults.js';
export { loadConfigFile, resolveRunConfig } from './loader.js';
export type { ConfigOverrides, ResolveConfigInput } from './loader.js';
export { ConfigError } from './errors.js';
