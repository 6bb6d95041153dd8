import { z } from 'zod';

import { modelNameSchema } from '../schema/config.js';
import { parseOrThrow } from '../utils/validation.js';

// ── LLMClient interface ──────────────────────────────────────

export type ImageMimeType = 'image/png' | 'image/jpeg' | 'image/gif' | 'image/webp';

/**
 * Raw-text model access. Providers do not retry: transient faults are
 * raised as `LLMError` with `kind: 'transient'` and the calling step's
 * RetryPolicy decides what happens next.
 */
export interface LLMClient {
  generate(systemPrompt: string, userPrompt: string): Promise<string>;
  generateWithImage(
    systemPrompt: string,
    userPrompt: string,
    imageBase64: string,
    mimeType: ImageMimeType,
  ): Promise<string>;
}

// ── Config schema ────────────────────────────────────────────

export const llmProviderSchema = z.enum(['anthropic', 'openai', 'mock']);

export type LLMProvider = z.infer<typeof llmProviderSchema>;

export const llmConfigSchema = z.object({
  provider: llmProviderSchema,
  apiKey: z.string().min(1).optional(),
  model: modelNameSchema.optional(),
});

export type LLMConfig = z.infer<typeof llmConfigSchema>;

// ── Env loader ───────────────────────────────────────────────

export interface LLMConfigOverrides {
  provider?: LLMProvider | undefined;
  model?: string | undefined;
}

/**
 * Environment first, then overrides from the config file or CLI flags.
 * Empty variables count as unset.
 */
export function loadLLMConfig(
  overrides: LLMConfigOverrides = {},
  env: NodeJS.ProcessEnv = process.env,
): LLMConfig {
  const provider = overrides.provider ?? nonEmpty(env['LLM_PROVIDER']) ?? 'anthropic';

  const apiKey = provider === 'anthropic'
    ? nonEmpty(env['ANTHROPIC_API_KEY'])
    : nonEmpty(env['OPENAI_API_KEY']);

  const model = overrides.model ?? (provider === 'anthropic'
    ? nonEmpty(env['PAGECHECK_MODEL'])
    : nonEmpty(env['LLM_MODEL']));

  return parseOrThrow(llmConfigSchema, { provider, apiKey, model }, 'LLM configuration');
}

function nonEmpty(value: string | undefined): string | undefined {
  return value === undefined || value.trim() === '' ? undefined : value.trim();
}
