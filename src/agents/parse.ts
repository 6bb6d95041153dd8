import type { z } from 'zod';

import { ResponseParseError, describeError } from '../core/errors.js';
import { extractJSON } from '../utils/text.js';
import * as log from '../utils/logger.js';

// ── Findings list parsing ────────────────────────────────────

/**
 * Parse a model response into a list of `T`.
 *
 * The response must contain a JSON array (fenced or bare); otherwise a
 * `ResponseParseError` is thrown. Entries that fail `itemSchema` are
 * dropped with a warning, so one malformed entry does not lose the rest.
 */
export function parseFindingList<T>(
  raw: string,
  itemSchema: z.ZodType<T, z.ZodTypeDef, unknown>,
  label: string,
): T[] {
  const json = extractJSON(raw);

  let value: unknown;
  try {
    value = JSON.parse(json);
  } catch (err) {
    throw new ResponseParseError(
      `${label}: model output is not valid JSON (${describeError(err)})`,
      raw,
    );
  }

  if (!Array.isArray(value)) {
    throw new ResponseParseError(
      `${label}: expected a JSON array, got ${value === null ? 'null' : typeof value}`,
      raw,
    );
  }

  const entries: readonly unknown[] = value;
  const items: T[] = [];
  let dropped = 0;

  for (const entry of entries) {
    const parsed = itemSchema.safeParse(entry);
    if (parsed.success) {
      items.push(parsed.data);
    } else {
      dropped++;
    }
  }

  if (dropped > 0) {
    log.warn(
      `${label}: dropped ${String(dropped)} malformed entr${dropped === 1 ? 'y' : 'ies'} from model output`,
    );
  }

  return items;
}
