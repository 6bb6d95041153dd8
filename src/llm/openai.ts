import { z } from 'zod';

import { LLMError, ResponseParseError, describeError } from '../core/errors.js';
import * as log from '../utils/logger.js';
import type { ImageMimeType, LLMClient } from './client.js';

// ── Constants ────────────────────────────────────────────────

const DEFAULT_MODEL = 'gpt-4o-mini';
const COMPLETIONS_URL = 'https://api.openai.com/v1/chat/completions';

// ── Response validation ──────────────────────────────────────

const chatResponseSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.string(),
        }),
      }),
    )
    .nonempty(),
});

// ── Transport ────────────────────────────────────────────────

export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

function isTransientStatus(status: number): boolean {
  return status === 408 || status === 429 || status >= 500;
}

async function post(
  fetchImpl: FetchLike,
  apiKey: string,
  payload: unknown,
): Promise<string> {
  let response: Response;
  try {
    response = await fetchImpl(COMPLETIONS_URL, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        Authorization: `Bearer ${apiKey}`,
      },
      body: JSON.stringify(payload),
    });
  } catch (err) {
    throw new LLMError(`OpenAI API connection failed: ${describeError(err)}`, {
      transient: true,
      cause: err,
    });
  }

  const raw = await response.text();

  if (!response.ok) {
    throw new LLMError(
      `OpenAI API error (${String(response.status)}): ${raw}`,
      { transient: isTransientStatus(response.status), status: response.status },
    );
  }

  let body: unknown;
  try {
    body = JSON.parse(raw);
  } catch {
    throw new ResponseParseError('OpenAI API returned a non-JSON body', raw);
  }

  const parsed = chatResponseSchema.safeParse(body);
  if (!parsed.success) {
    throw new ResponseParseError('OpenAI API response has no message content', raw);
  }

  return parsed.data.choices[0].message.content;
}

// ── Provider factory ─────────────────────────────────────────

export function createOpenAIClient(
  apiKey: string,
  model?: string,
  fetchImpl: FetchLike = fetch,
): LLMClient {
  const resolvedModel = model ?? DEFAULT_MODEL;

  return {
    async generate(systemPrompt: string, userPrompt: string): Promise<string> {
      log.llm(`openai ${resolvedModel}`);
      return post(fetchImpl, apiKey, {
        model: resolvedModel,
        messages: [
          { role: 'system', content: systemPrompt },
          { role: 'user', content: userPrompt },
        ],
        temperature: 0,
      });
    },

    async generateWithImage(
      systemPrompt: string,
      userPrompt: string,
      imageBase64: string,
      mimeType: ImageMimeType,
    ): Promise<string> {
      log.llm(`openai ${resolvedModel} (image)`);
      const dataUri = `data:${mimeType};base64,${imageBase64}`;

      return post(fetchImpl, apiKey, {
        model: resolvedModel,
        messages: [
          { role: 'system', content: systemPrompt },
          {
            role: 'user',
            content: [
              {
                type: 'image_url',
                image_url: { url: dataUri },
              },
              {
                type: 'text',
                text: userPrompt,
              },
            ],
          },
        ],
        temperature: 0,
      });
    },
  };
}
