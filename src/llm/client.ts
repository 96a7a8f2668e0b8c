import { z } from 'zod';

import { llmProviderSchema } from '../schema/config.js';

export { llmProviderSchema };
export type { LLMProvider } from '../schema/config.js';

// ── LLMClient interface ──────────────────────────────────────

export interface LLMClient {
  generate(systemPrompt: string, userPrompt: string): Promise<string>;
}

// ── Config schema ────────────────────────────────────────────

export const llmConfigSchema = z.object({
  provider: llmProviderSchema,
  apiKey: z.string().min(1).optional(),
  model: z.string().min(1).optional(),
});

export type LLMConfig = z.infer<typeof llmConfigSchema>;

// ── Env loader ───────────────────────────────────────────────

const API_KEY_VARS = {
  anthropic: 'ANTHROPIC_API_KEY',
  openai: 'OPENAI_API_KEY',
  gemini: 'GEMINI_API_KEY',
  mock: undefined,
} as const;

export function loadLLMConfig(
  env: NodeJS.ProcessEnv = process.env,
): LLMConfig {
  const provider = llmProviderSchema.parse(env['LLM_PROVIDER'] ?? 'anthropic');
  const keyVar = API_KEY_VARS[provider];

  return llmConfigSchema.parse({
    provider,
    apiKey: keyVar !== undefined ? emptyToUndefined(env[keyVar]) : undefined,
    model: emptyToUndefined(env['LLM_MODEL']),
  });
}

export function apiKeyVariable(config: LLMConfig): string | undefined {
  return API_KEY_VARS[config.provider];
}

function emptyToUndefined(value: string | undefined): string | undefined {
  return value === undefined || value.trim() === '' ? undefined : value;
}
