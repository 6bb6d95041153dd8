import type { z } from 'zod';

import { ConfigurationError } from '../core/errors.js';

// ── URL ─────────────────────────────────────────────────────

/**
 * Validate and normalize a target address. A bare host gets `https://`.
 * Throws `ConfigurationError` for anything that is not an http(s) URL.
 */
export function validateUrl(input: string): string {
  const trimmed = input.trim();
  if (trimmed.length === 0) {
    throw new ConfigurationError('URL must be a non-empty string');
  }

  const withScheme = /^[a-z][a-z0-9+.-]*:\/\//i.test(trimmed)
    ? trimmed
    : `https://${trimmed}`;

  let parsed: URL;
  try {
    parsed = new URL(withScheme);
  } catch {
    throw new ConfigurationError(`Invalid URL: ${input}`);
  }

  if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
    throw new ConfigurationError(
      `Unsupported URL scheme "${parsed.protocol}" in ${input}`,
    );
  }
  if (!parsed.hostname) {
    throw new ConfigurationError(`Invalid URL: ${input}`);
  }

  return withScheme;
}

// ── Schema parsing ──────────────────────────────────────────

export function formatZodIssues(error: z.ZodError): string {
  return error.issues
    .map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`)
    .join('; ');
}

/** `schema.parse`, with failures raised as `ConfigurationError`. */
export function parseOrThrow<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  value: unknown,
  what: string,
): T {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid ${what}: ${formatZodIssues(parsed.error)}`);
  }
  return parsed.data;
}
