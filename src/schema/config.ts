import { z } from 'zod';

import { LOG_LEVELS } from '../utils/logger.js';

// ── Search engine profile ───────────────────────────────────

export const searchEngineSchema = z.object({
  homeUrl: z.string().url(),
  inputSelector: z.string().min(1),
  submitSelector: z.string().min(1),
  resultsSelector: z.string().min(1),
});

export type SearchEngineProfile = z.infer<typeof searchEngineSchema>;

export const BING: SearchEngineProfile = {
  homeUrl: 'https://www.bing.com',
  inputSelector: '#sb_form_q',
  submitSelector: '#search_icon',
  resultsSelector: '#b_results',
};

// ── Shared enums ────────────────────────────────────────────

export const llmProviderSchema = z.enum(['anthropic', 'openai', 'gemini', 'mock']);

export type LLMProvider = z.infer<typeof llmProviderSchema>;

export const logLevelSchema = z.enum(LOG_LEVELS);

// ── Config file (.searchloop.yaml) ──────────────────────────
// Every field optional: env and CLI flags fill the gaps.

export const fileConfigSchema = z.object({
  provider: llmProviderSchema.optional(),
  model: z.string().min(1).optional(),
  driverPath: z.string().min(1).optional(),
  browserChannel: z.string().min(1).optional(),
  headless: z.boolean().optional(),
  debug: z.boolean().optional(),
  logLevel: logLevelSchema.optional(),
  maxCycles: z.number().int().positive().optional(),
  minDelay: z.number().int().nonnegative().optional(),
  maxDelay: z.number().int().nonnegative().optional(),
  logDir: z.string().min(1).optional(),
  engine: searchEngineSchema.partial().optional(),
});

export type FileConfig = z.infer<typeof fileConfigSchema>;

// ── Resolved run config ─────────────────────────────────────

export const runConfigSchema = z
  .object({
    provider: llmProviderSchema,
    apiKey: z.string().min(1).optional(),
    model: z.string().min(1).optional(),
    /** `auto` uses the browser Playwright discovers; anything else is an executable path. */
    driverPath: z.string().min(1),
    browserChannel: z.string().min(1).optional(),
    headless: z.boolean(),
    debug: z.boolean(),
    logLevel: logLevelSchema,
    maxCycles: z.number().int().positive(),
    minDelay: z.number().int().nonnegative(),
    maxDelay: z.number().int().nonnegative(),
    logDir: z.string().min(1),
    engine: searchEngineSchema,
  })
  .refine((c) => c.minDelay <= c.maxDelay, {
    message: 'minDelay must not exceed maxDelay',
    path: ['minDelay'],
  });

export type RunConfig = z.infer<typeof runConfigSchema>;
