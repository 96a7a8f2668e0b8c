/**
 * Default configuration values.
 * Run-level values are overridable via config file, env or CLI flags;
 * the timing tables are fixed.
 */

export const TIMEOUTS = {
  /** Hard bound on each page-state phase: load + search box, then results. */
  PAGE_STATE_WAIT: 15_000,
  ACTION_TIMEOUT: 8_000,
  POLL_INTERVAL: 250,
  RECOVERY_COOLDOWN: 5_000,
} as const;

export const LIMITS = {
  MAX_GENERATION_ATTEMPTS: 3,
  GENERATION_BASE_DELAY: 1_000,
  HISTORY_CAPACITY: 20,
  HISTORY_CONTEXT: 3,
  MIN_QUERY_CHARS: 3,
  MAX_QUERY_CHARS: 100,
  MIN_QUERY_WORDS: 3,
  MAX_QUERY_WORDS: 15,
} as const;

export const HUMAN_TIMING = {
  KEY_DELAY_MIN: 50,
  KEY_DELAY_MAX: 150,
  THINK_CHANCE: 0.1,
  THINK_DELAY_MIN: 200,
  THINK_DELAY_MAX: 800,
  SUBMIT_DELAY_MIN: 500,
  SUBMIT_DELAY_MAX: 2_000,
  POINTER_MOVES_MIN: 2,
  POINTER_MOVES_MAX: 5,
  POINTER_OFFSET: 100,
  SCROLL_MIN: 300,
  SCROLL_MAX: 800,
  READ_DELAY_MIN: 1_000,
  READ_DELAY_MAX: 3_000,
  SCROLL_BACK_CHANCE: 0.3,
} as const;

export const VIEWPORT = {
  width: 800,
  height: 600,
} as const;

export const RUN_DEFAULTS = {
  MAX_CYCLES: 10,
  MIN_DELAY_SECONDS: 5,
  MAX_DELAY_SECONDS: 45,
  LOG_DIR: '.',
  CONFIG_FILE: '.searchloop.yaml',
} as const;

export const LLM_DEFAULTS = {
  TEMPERATURE: 0.9,
  MAX_TOKENS: 64,
} as const;
