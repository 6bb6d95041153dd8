// ── Whitespace + length normalization ───────────────────────

/**
 * Collapse runs of whitespace into single spaces and trim.
 * Truncates to `maxLength` characters when given.
 */
export function cleanText(text: string, maxLength?: number): string {
  if (!text) return '';

  const collapsed = text.split(/\s+/).filter(Boolean).join(' ');

  if (maxLength !== undefined && maxLength > 0 && collapsed.length > maxLength) {
    return collapsed.slice(0, maxLength);
  }

  return collapsed;
}

export function truncateWithEllipsis(text: string, maxLength = 100): string {
  if (text.length <= maxLength) return text;
  return text.slice(0, maxLength - 3) + '...';
}

// ── JSON extraction ─────────────────────────────────────────

/**
 * Pull the JSON payload out of a model response.
 * Prefers a fenced block, then the outermost `[...]` or `{...}` span.
 */
export function extractJSON(raw: string): string {
  const fenced = /```(?:json)?\s*\n?([\s\S]*?)```/.exec(raw);
  if (fenced?.[1]) return fenced[1].trim();

  const arrayStart = raw.indexOf('[');
  const objectStart = raw.indexOf('{');
  const useArray =
    arrayStart !== -1 && (objectStart === -1 || arrayStart < objectStart);

  const [open, close] = useArray ? ['[', ']'] : ['{', '}'];
  const start = raw.indexOf(open);
  const end = raw.lastIndexOf(close);
  if (start !== -1 && end > start) return raw.slice(start, end + 1);

  return raw.trim();
}
