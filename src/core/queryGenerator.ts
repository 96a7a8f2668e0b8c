import { readFile } from 'node:fs/promises';
import path from 'node:path';
import { fileURLToPath } from 'node:url';

import type { LLMClient } from '../llm/index.js';
import type { GeneratedQuery, SearchParameters } from '../schema/index.js';
import {
  DEFAULT_SEARCH_PARAMETERS,
  FALLBACK_CATEGORY,
  FALLBACK_QUERY_TYPE,
  FORBIDDEN_TERMS,
} from '../schema/index.js';
import { LIMITS } from '../config/defaults.js';
import type { Clock } from '../utils/clock.js';
import { errorMessage, systemClock } from '../utils/clock.js';
import type { RandomSource } from '../utils/random.js';
import { mathRandom, pick } from '../utils/random.js';
import * as log from '../utils/logger.js';
import { SearchHistory } from './history.js';
import { retry } from './retry.js';
import type { RetryPolicy } from './retry.js';

// ── Public types ─────────────────────────────────────────────

export interface QueryGeneratorDeps {
  client: LLMClient;
  random?: RandomSource;
  clock?: Clock;
  parameters?: SearchParameters;
  history?: SearchHistory;
  policy?: RetryPolicy;
}

export interface PromptParameters {
  category: string;
  queryType: string;
  complexity: string;
}

// ── Error ────────────────────────────────────────────────────

export class QueryRejectedError extends Error {
  readonly query: string;

  constructor(query: string, reason: string) {
    super(`Generated query rejected (${reason}): "${query}"`);
    this.name = 'QueryRejectedError';
    this.query = query;
  }
}

// ── Template paths ───────────────────────────────────────────

const THIS_DIR = path.dirname(fileURLToPath(import.meta.url));
const PROMPTS_DIR = path.join(THIS_DIR, '..', '..', 'prompts');

const SYSTEM_PROMPT =
  'You generate realistic web search queries. Output plain text only.';

export const DEFAULT_GENERATION_POLICY: RetryPolicy = {
  maxAttempts: LIMITS.MAX_GENERATION_ATTEMPTS,
  delayMs: LIMITS.GENERATION_BASE_DELAY,
  backoff: 'exponential',
};

// ── Cleaning + validation ────────────────────────────────────

/** Trim whitespace, then surrounding double quotes, then single quotes. */
export function cleanQuery(raw: string): string {
  return raw
    .trim()
    .replace(/^"+|"+$/g, '')
    .replace(/^'+|'+$/g, '')
    .trim();
}

/** Returns the rejection reason, or null when the query is usable. */
export function validateQuery(query: string): string | null {
  if (query.length === 0) return 'empty';
  if (query.length < LIMITS.MIN_QUERY_CHARS) return 'too short';
  if (query.length > LIMITS.MAX_QUERY_CHARS) return 'too long';

  const lowered = query.toLowerCase();
  const term = FORBIDDEN_TERMS.find((t) => lowered.includes(t));
  if (term !== undefined) return `forbidden term "${term}"`;

  return null;
}

// ── Generator ────────────────────────────────────────────────

export class QueryGenerator {
  readonly history: SearchHistory;

  private readonly client: LLMClient;
  private readonly random: RandomSource;
  private readonly clock: Clock;
  private readonly parameters: SearchParameters;
  private readonly policy: RetryPolicy;
  private template: string | undefined;

  constructor(deps: QueryGeneratorDeps) {
    this.client = deps.client;
    this.random = deps.random ?? mathRandom;
    this.clock = deps.clock ?? systemClock;
    this.parameters = deps.parameters ?? DEFAULT_SEARCH_PARAMETERS;
    this.history = deps.history ?? new SearchHistory();
    this.policy = deps.policy ?? DEFAULT_GENERATION_POLICY;
  }

  /**
   * One service call per attempt; a rejected candidate burns the attempt.
   * Never fails: an exhausted budget yields the fallback query.
   */
  async generate(signal?: AbortSignal): Promise<GeneratedQuery> {
    const result = await retry(
      async () => {
        const params = this.drawParameters();
        const prompt = await this.buildPrompt(params);
        const raw = await this.client.generate(SYSTEM_PROMPT, prompt);

        const text = cleanQuery(raw);
        const rejection = validateQuery(text);
        if (rejection !== null) throw new QueryRejectedError(text, rejection);

        return { text, category: params.category, queryType: params.queryType };
      },
      this.policy,
      {
        clock: this.clock,
        signal,
        onRetry: (err, attempt, delayMs) => {
          log.warn(
            `Query generation attempt ${String(attempt)} failed: ${errorMessage(err)} (retrying in ${(delayMs / 1000).toFixed(1)}s)`,
          );
        },
      },
    );

    if (result.ok) {
      this.history.push(result.value.text);
      log.query(result.value.text, result.value.category, result.value.queryType);
      return result.value;
    }

    log.warn(
      `Query generation attempt ${String(result.attempts)} failed: ${errorMessage(result.error)}`,
    );
    const fallback = this.fallback();
    log.warn(`Using fallback query: ${fallback.text}`);
    return fallback;
  }

  /** Deterministic, service-independent query. */
  fallback(): GeneratedQuery {
    return {
      text: `what is ${pick(this.random, this.parameters.categories)}`,
      category: FALLBACK_CATEGORY,
      queryType: FALLBACK_QUERY_TYPE,
    };
  }

  async buildPrompt(params: PromptParameters): Promise<string> {
    const template = (this.template ??= await readFile(
      path.join(PROMPTS_DIR, 'query.txt'),
      'utf-8',
    ));

    const recent = this.history.recent(LIMITS.HISTORY_CONTEXT);
    const historyLine =
      recent.length > 0 ? `Recent search topics: ${recent.join(', ')}. ` : '';

    return template
      .replaceAll('{{history}}', historyLine)
      .replaceAll('{{complexity}}', params.complexity)
      .replaceAll('{{queryType}}', params.queryType)
      .replaceAll('{{category}}', params.category)
      .replaceAll('{{minWords}}', String(LIMITS.MIN_QUERY_WORDS))
      .replaceAll('{{maxWords}}', String(LIMITS.MAX_QUERY_WORDS));
  }

  private drawParameters(): PromptParameters {
    return {
      category: pick(this.random, this.parameters.categories),
      queryType: pick(this.random, this.parameters.queryTypes),
      complexity: pick(this.random, this.parameters.complexityLevels),
    };
  }
}
