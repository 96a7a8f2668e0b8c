import type { LLMClient } from './client.js';

const DEFAULT_RESPONSE = 'how do tides work';

/**
 * Mock LLM provider for testing and dry runs.
 * Returns the canned responses in order, then repeats the default.
 * An Error in the list is thrown instead of returned.
 */
export function createMockClient(
  responses?: readonly (string | Error)[],
): LLMClient & { readonly calls: number } {
  let callIndex = 0;

  return {
    get calls(): number {
      return callIndex;
    },

    async generate(
      _systemPrompt: string,
      _userPrompt: string,
    ): Promise<string> {
      const response = responses?.[callIndex] ?? DEFAULT_RESPONSE;
      callIndex++;
      if (response instanceof Error) throw response;
      return response;
    },
  };
}
