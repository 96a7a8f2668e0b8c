import { readFile } from 'node:fs/promises';

import { parse as parseYaml } from 'yaml';
import { ZodError } from 'zod';

import { BING, fileConfigSchema, runConfigSchema } from '../schema/config.js';
import type { FileConfig, RunConfig } from '../schema/config.js';
import { apiKeyVariable, loadLLMConfig } from '../llm/client.js';
import { RUN_DEFAULTS } from './defaults.js';
import { ConfigError } from './errors.js';

// ── Public types ─────────────────────────────────────────────

/** CLI flag overrides; highest precedence. */
export interface ConfigOverrides {
  maxCycles?: number | undefined;
  minDelay?: number | undefined;
  maxDelay?: number | undefined;
  headless?: boolean | undefined;
  logDir?: string | undefined;
}

export interface ResolveConfigInput {
  env?: NodeJS.ProcessEnv;
  file?: FileConfig;
  overrides?: ConfigOverrides;
}

const PLACEHOLDER_KEY = /^your_.*_here$/i;

// ── Config file ──────────────────────────────────────────────

/**
 * Load and validate a `.searchloop.yaml` (or JSON) config file.
 * A missing file yields `{}` when `optional`, otherwise a ConfigError.
 */
export async function loadConfigFile(
  configPath: string,
  options: { optional?: boolean } = {},
): Promise<FileConfig> {
  let raw: string;
  try {
    raw = await readFile(configPath, 'utf-8');
  } catch (err) {
    if (options.optional && isMissingFile(err)) return {};
    throw new ConfigError(`Cannot read config file ${configPath}`, {
      cause: err,
    });
  }

  try {
    const parsed: unknown = configPath.endsWith('.json')
      ? JSON.parse(raw)
      : parseYaml(raw);
    return fileConfigSchema.parse(parsed ?? {});
  } catch (err) {
    throw new ConfigError(
      `Invalid config file ${configPath}: ${describe(err)}`,
      { cause: err },
    );
  }
}

// ── Resolution ───────────────────────────────────────────────

/**
 * Merge defaults ← config file ← env ← CLI flags and validate the result.
 * A missing or placeholder API key is fatal for every real provider.
 */
export function resolveRunConfig(input: ResolveConfigInput = {}): RunConfig {
  const env = input.env ?? process.env;
  const file = input.file ?? {};
  const overrides = input.overrides ?? {};

  let candidate: unknown;
  try {
    const llm = loadLLMConfig(withFileProvider(env, file));

    candidate = {
      provider: llm.provider,
      apiKey: llm.apiKey,
      model: llm.model ?? file.model,
      driverPath: env['BROWSER_DRIVER_PATH'] ?? file.driverPath ?? 'auto',
      browserChannel: env['BROWSER_CHANNEL'] ?? file.browserChannel,
      headless:
        overrides.headless ?? envFlag(env, 'HEADLESS') ?? file.headless ?? false,
      debug: envFlag(env, 'DEBUG_MODE') ?? file.debug ?? false,
      logLevel: env['LOG_LEVEL']?.toLowerCase() ?? file.logLevel ?? 'info',
      maxCycles:
        overrides.maxCycles ??
        envInt(env, 'MAX_SEARCH_CYCLES') ??
        file.maxCycles ??
        RUN_DEFAULTS.MAX_CYCLES,
      minDelay:
        overrides.minDelay ??
        envInt(env, 'MIN_DELAY') ??
        file.minDelay ??
        RUN_DEFAULTS.MIN_DELAY_SECONDS,
      maxDelay:
        overrides.maxDelay ??
        envInt(env, 'MAX_DELAY') ??
        file.maxDelay ??
        RUN_DEFAULTS.MAX_DELAY_SECONDS,
      logDir:
        overrides.logDir ?? env['SEARCH_LOG_DIR'] ?? file.logDir ?? RUN_DEFAULTS.LOG_DIR,
      engine: { ...BING, ...file.engine },
    };
  } catch (err) {
    throw new ConfigError(`Invalid configuration: ${describe(err)}`, {
      cause: err,
    });
  }

  const parsed = runConfigSchema.safeParse(candidate);
  if (!parsed.success) {
    throw new ConfigError(
      `Invalid configuration: ${describe(parsed.error)}`,
      { cause: parsed.error },
    );
  }

  const config = parsed.data;
  const keyVar = apiKeyVariable(config);
  if (
    keyVar !== undefined &&
    (config.apiKey === undefined || PLACEHOLDER_KEY.test(config.apiKey))
  ) {
    throw new ConfigError(`${keyVar} is not set (check your .env file)`);
  }

  return config;
}

// ── Helpers ──────────────────────────────────────────────────

// The env provider wins; the config file only fills it in.
function withFileProvider(
  env: NodeJS.ProcessEnv,
  file: FileConfig,
): NodeJS.ProcessEnv {
  if (env['LLM_PROVIDER'] !== undefined || file.provider === undefined) {
    return env;
  }
  return { ...env, LLM_PROVIDER: file.provider };
}

function envFlag(env: NodeJS.ProcessEnv, name: string): boolean | undefined {
  const value = env[name]?.trim().toLowerCase();
  if (value === undefined || value === '') return undefined;
  if (value === 'true' || value === '1') return true;
  if (value === 'false' || value === '0') return false;
  throw new Error(`${name} must be true or false, got "${value}"`);
}

function envInt(env: NodeJS.ProcessEnv, name: string): number | undefined {
  const value = env[name]?.trim();
  if (value === undefined || value === '') return undefined;
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new Error(`${name} must be an integer, got "${value}"`);
  }
  return parsed;
}

function isMissingFile(err: unknown): boolean {
  return (
    typeof err === 'object' &&
    err !== null &&
    'code' in err &&
    err.code === 'ENOENT'
  );
}

function describe(err: unknown): string {
  if (err instanceof ZodError) {
    return err.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
  }
  return err instanceof Error ? err.message : String(err);
}
