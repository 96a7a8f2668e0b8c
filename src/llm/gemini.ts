import { z } from 'zod';

import { LLM_DEFAULTS } from '../config/defaults.js';
import type { LLMClient } from './client.js';

// ── Constants ────────────────────────────────────────────────

const DEFAULT_MODEL = 'gemini-2.0-flash-lite';
const API_BASE = 'https://generativelanguage.googleapis.com/v1beta/models';

// Block medium-and-above on every harm category.
const SAFETY_SETTINGS = [
  'HARM_CATEGORY_HARASSMENT',
  'HARM_CATEGORY_HATE_SPEECH',
  'HARM_CATEGORY_SEXUALLY_EXPLICIT',
  'HARM_CATEGORY_DANGEROUS_CONTENT',
].map((category) => ({ category, threshold: 'BLOCK_MEDIUM_AND_ABOVE' }));

// ── Response validation ──────────────────────────────────────

const generateContentResponseSchema = z.object({
  candidates: z
    .array(
      z.object({
        content: z.object({
          parts: z.array(z.object({ text: z.string() })).nonempty(),
        }),
      }),
    )
    .nonempty(),
});

// ── Provider factory ─────────────────────────────────────────

export function createGeminiClient(
  apiKey: string,
  model?: string,
): LLMClient {
  const resolvedModel = model ?? DEFAULT_MODEL;
  const url = `${API_BASE}/${encodeURIComponent(resolvedModel)}:generateContent`;

  return {
    async generate(systemPrompt: string, userPrompt: string): Promise<string> {
      const response = await fetch(url, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          'x-goog-api-key': apiKey,
        },
        body: JSON.stringify({
          systemInstruction: { parts: [{ text: systemPrompt }] },
          contents: [{ role: 'user', parts: [{ text: userPrompt }] }],
          safetySettings: SAFETY_SETTINGS,
          generationConfig: {
            temperature: LLM_DEFAULTS.TEMPERATURE,
            maxOutputTokens: LLM_DEFAULTS.MAX_TOKENS,
          },
        }),
      });

      if (!response.ok) {
        const body = await response.text();
        throw new Error(
          `Gemini API error (${String(response.status)}): ${body}`,
        );
      }

      const body: unknown = await response.json();
      const parsed = generateContentResponseSchema.parse(body);

      return parsed.candidates[0].content.parts
        .map((part) => part.text)
        .join('');
    },
  };
}
