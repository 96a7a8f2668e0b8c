import { z } from 'zod';

// ── SearchParameters ─────────────────────────────────────────

export const SEARCH_CATEGORIES = [
  'technology',
  'current events',
  'pop culture',
  'science',
  'entertainment',
  'sports',
  'health',
  'travel',
  'food',
  'history',
  'nature',
  'space',
  'education',
  'business',
] as const;

export const QUERY_TYPES = [
  'question',
  'fact',
  'news search',
  'definition',
  'how to',
  'what is',
  'why does',
  'comparison',
] as const;

export const COMPLEXITY_LEVELS = ['simple', 'detailed', 'comprehensive'] as const;

export interface SearchParameters {
  readonly categories: readonly [string, ...string[]];
  readonly queryTypes: readonly [string, ...string[]];
  readonly complexityLevels: readonly [string, ...string[]];
}

export const DEFAULT_SEARCH_PARAMETERS: SearchParameters = Object.freeze({
  categories: SEARCH_CATEGORIES,
  queryTypes: QUERY_TYPES,
  complexityLevels: COMPLEXITY_LEVELS,
});

// Case-insensitive substring match against generated queries.
export const FORBIDDEN_TERMS = ['explicit', 'illegal', 'hack', 'crack'] as const;

// ── GeneratedQuery ───────────────────────────────────────────

export const FALLBACK_CATEGORY = 'general';
export const FALLBACK_QUERY_TYPE = 'fallback';

export const generatedQuerySchema = z.object({
  text: z.string().min(1),
  category: z.string().min(1),
  queryType: z.string().min(1),
});

export type GeneratedQuery = Readonly<z.infer<typeof generatedQuerySchema>>;
