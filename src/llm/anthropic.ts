import Anthropic from '@anthropic-ai/sdk';

import { LLMError, describeError } from '../core/errors.js';
import * as log from '../utils/logger.js';
import type { ImageMimeType, LLMClient } from './client.js';

// ── Constants ────────────────────────────────────────────────

const DEFAULT_MODEL = 'claude-sonnet-4-5-20250929';
const MAX_TOKENS = 4096;

// ── Error mapping ───────────────────────────────────────────

/** Rate limits, overload, 5xx and dropped connections are worth another try. */
export function toAnthropicLLMError(err: unknown): LLMError {
  if (err instanceof LLMError) return err;

  if (err instanceof Anthropic.APIConnectionError) {
    return new LLMError(`Anthropic API connection failed: ${err.message}`, {
      transient: true,
      cause: err,
    });
  }

  if (err instanceof Anthropic.APIError) {
    const status = err.status;
    const transient = status === undefined || status === 429 || status === 529 || status >= 500;
    return new LLMError(
      `Anthropic API error (${status === undefined ? 'no status' : String(status)}): ${err.message}`,
      { transient, status, cause: err },
    );
  }

  return new LLMError(`Anthropic API call failed: ${describeError(err)}`, {
    transient: false,
    cause: err,
  });
}

// ── Provider factory ─────────────────────────────────────────

export function createAnthropicClient(
  apiKey: string,
  model?: string,
): LLMClient {
  const resolvedModel = model ?? DEFAULT_MODEL;
  // Retries belong to the step's RetryPolicy, not the SDK.
  const client = new Anthropic({ apiKey, maxRetries: 0 });

  async function complete(
    systemPrompt: string,
    content: Anthropic.MessageParam['content'],
  ): Promise<string> {
    log.llm(`anthropic ${resolvedModel}`);

    let response: Anthropic.Message;
    try {
      response = await client.messages.create({
        model: resolvedModel,
        max_tokens: MAX_TOKENS,
        system: systemPrompt,
        messages: [{ role: 'user', content }],
        temperature: 0,
      });
    } catch (err) {
      throw toAnthropicLLMError(err);
    }

    const firstBlock = response.content[0];
    if (!firstBlock || firstBlock.type !== 'text') {
      throw new LLMError('Anthropic API returned no text content', {
        transient: false,
      });
    }

    return firstBlock.text;
  }

  return {
    async generate(systemPrompt: string, userPrompt: string): Promise<string> {
      return complete(systemPrompt, userPrompt);
    },

    async generateWithImage(
      systemPrompt: string,
      userPrompt: string,
      imageBase64: string,
      mimeType: ImageMimeType,
    ): Promise<string> {
      return complete(systemPrompt, [
        {
          type: 'image',
          source: {
            type: 'base64',
            media_type: mimeType,
            data: imageBase64,
          },
        },
        {
          type: 'text',
          text: userPrompt,
        },
      ]);
    },
  };
}
