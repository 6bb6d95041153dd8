import type { LLMClient } from './client.js';

const DEFAULT_RESPONSE = '[]';

/**
 * Offline provider. Returns the given canned responses in call order, text
 * and image calls alike, then an empty findings list.
 */
export function createMockClient(
  responses?: readonly string[],
): LLMClient {
  let callIndex = 0;

  function next(): string {
    const response = responses?.[callIndex] ?? DEFAULT_RESPONSE;
    callIndex++;
    return response;
  }

  return {
    async generate(): Promise<string> {
      return next();
    },

    async generateWithImage(): Promise<string> {
      return next();
    },
  };
}
