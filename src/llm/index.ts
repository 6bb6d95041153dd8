/**
 * LLM access for the agents' analysis steps.
 * The only module that talks to a model provider.
 */

import { ConfigurationError } from '../core/errors.js';
import type { LLMClient, LLMConfig, LLMProvider } from './client.js';
import { createAnthropicClient } from './anthropic.js';
import { createOpenAIClient } from './openai.js';
import { createMockClient } from './mock.js';

export * from './client.js';
export { createAnthropicClient, toAnthropicLLMError } from './anthropic.js';
export { createOpenAIClient } from './openai.js';
export type { FetchLike } from './openai.js';
export { createMockClient } from './mock.js';

// ── Provider factory ─────────────────────────────────────────

const KEY_VARIABLE: Record<Exclude<LLMProvider, 'mock'>, string> = {
  anthropic: 'ANTHROPIC_API_KEY',
  openai: 'OPENAI_API_KEY',
};

function requireKey(provider: Exclude<LLMProvider, 'mock'>, apiKey: string | undefined): string {
  if (apiKey === undefined) {
    throw new ConfigurationError(
      `${KEY_VARIABLE[provider]} is required when using the ${provider} provider`,
    );
  }
  return apiKey;
}

export function createLLMClient(config: LLMConfig): LLMClient {
  switch (config.provider) {
    case 'anthropic':
      return createAnthropicClient(requireKey('anthropic', config.apiKey), config.model);
    case 'openai':
      return createOpenAIClient(requireKey('openai', config.apiKey), config.model);
    case 'mock':
      return createMockClient();
  }
}
