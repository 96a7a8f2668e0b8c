import Anthropic from '@anthropic-ai/sdk';

import { LLM_DEFAULTS } from '../config/defaults.js';
import type { LLMClient } from './client.js';

// ── Constants ────────────────────────────────────────────────

const DEFAULT_MODEL = 'claude-3-5-haiku-latest';

// ── Provider factory ─────────────────────────────────────────

/**
 * One request per `generate` call: SDK-level retries are off because the
 * query generator owns the retry/backoff budget.
 */
export function createAnthropicClient(
  apiKey: string,
  model?: string,
): LLMClient {
  const resolvedModel = model ?? DEFAULT_MODEL;
  const client = new Anthropic({ apiKey, maxRetries: 0 });

  return {
    async generate(systemPrompt: string, userPrompt: string): Promise<string> {
      const response = await client.messages.create({
        model: resolvedModel,
        max_tokens: LLM_DEFAULTS.MAX_TOKENS,
        system: systemPrompt,
        messages: [{ role: 'user', content: userPrompt }],
        temperature: LLM_DEFAULTS.TEMPERATURE,
      });

      const firstBlock = response.content[0];
      if (!firstBlock || firstBlock.type !== 'text') {
        throw new Error('Anthropic API returned no text content');
      }

      return firstBlock.text;
    },
  };
}
