import { readFile } from 'node:fs/promises';
import path from 'node:path';
import { fileURLToPath } from 'node:url';

// ── Paths ────────────────────────────────────────────────────

const THIS_DIR = path.dirname(fileURLToPath(import.meta.url));
const PROMPTS_DIR = path.join(THIS_DIR, '..', '..', 'prompts');

// ── Loading ──────────────────────────────────────────────────

export type PromptName = 'spell_checker' | 'visual_qa';

/** Loaded once per process; templates never change at run time. */
const cache = new Map<PromptName, Promise<string>>();

export function loadPrompt(name: PromptName): Promise<string> {
  let template = cache.get(name);
  if (!template) {
    template = readFile(path.join(PROMPTS_DIR, `${name}.txt`), 'utf-8');
    cache.set(name, template);
    void template.catch(() => cache.delete(name));
  }
  return template;
}

/** Fill `{{key}}` placeholders. Values are inserted literally (no `$&` expansion). */
export function renderPrompt(
  template: string,
  values: Readonly<Record<string, string>>,
): string {
  let rendered = template;
  for (const [key, value] of Object.entries(values)) {
    rendered = rendered.split(`{{${key}}}`).join(value);
  }
  return rendered;
}
