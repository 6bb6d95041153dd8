import { z } from 'zod';

import type { AgentReport, BaseState, RegisteredAgent } from '../core/agent.js';
import { defineAgent } from '../core/agent.js';
import { ResponseParseError } from '../core/errors.js';
import { Pipeline } from '../core/pipeline.js';
import type { ValidationStep } from '../core/pipeline.js';
import type { RetryPolicy } from '../core/retry.js';
import type { PageScraper } from '../browser/index.js';
import type { LLMClient } from '../llm/index.js';
import type { Finding, SpellCheckerSettings, SpellingError } from '../schema/index.js';
import { spellingErrorSchema } from '../schema/index.js';
import { cleanText } from '../utils/text.js';
import { parseOrThrow } from '../utils/validation.js';
import * as log from '../utils/logger.js';
import { parseFindingList } from './parse.js';
import { loadPrompt, renderPrompt } from './prompts.js';

export const SPELL_CHECKER = 'spell_checker';

const SYSTEM_PROMPT =
  'You are a meticulous proofreader. You answer with JSON only, never with prose.';

// ── State ────────────────────────────────────────────────────

export interface SpellingFinding extends Finding {
  original: string;
  correction: string;
  context: string;
}

export interface SpellCheckerState extends BaseState {
  maxTextLength: number;
  waitMs: number;
  rawText: string;
  errors: readonly SpellingError[];
  report?: AgentReport<SpellingFinding> | undefined;
}

/** Per-target overrides accepted in `target.options`. */
const spellCheckerOptionsSchema = z.object({
  maxTextLength: z.number().int().positive().optional(),
  waitMs: z.number().int().nonnegative().optional(),
});

export interface SpellCheckerDeps {
  scraper: PageScraper;
  llm: LLMClient;
  settings: SpellCheckerSettings;
  retry: RetryPolicy;
}

// ── Steps ────────────────────────────────────────────────────

function scrapeStep(deps: SpellCheckerDeps): ValidationStep<SpellCheckerState> {
  return {
    name: 'scrape',
    retry: deps.retry,
    async run(state) {
      log.detail(`Scraping text from ${state.url}`);
      const text = await deps.scraper.extractText(state.url, {
        auth: state.auth,
        waitMs: state.waitMs,
      });
      const rawText = cleanText(text, state.maxTextLength);
      log.debug(`Extracted ${String(rawText.length)} characters`);
      return { rawText };
    },
  };
}

function analyzeStep(deps: SpellCheckerDeps): ValidationStep<SpellCheckerState> {
  return {
    name: 'analyze',
    retry: deps.retry,
    async run(state) {
      if (state.rawText.length === 0) {
        log.warn(`No text extracted from ${state.url}; skipping analysis`);
        return { errors: [] };
      }

      log.detail(`Analyzing ${String(state.rawText.length)} characters`);
      const template = await loadPrompt('spell_checker');
      const raw = await deps.llm.generate(
        SYSTEM_PROMPT,
        renderPrompt(template, { text: state.rawText }),
      );

      try {
        const errors = parseFindingList(raw, spellingErrorSchema, SPELL_CHECKER);
        log.detail(`Found ${String(errors.length)} potential error(s)`);
        return { errors };
      } catch (err) {
        // Unreadable output degrades to "nothing found" for this agent.
        if (!(err instanceof ResponseParseError)) throw err;
        log.warn(`${err.message}; continuing with no findings`);
        return { errors: [] };
      }
    },
  };
}

const reportStep: ValidationStep<SpellCheckerState> = {
  name: 'report',
  async run(state) {
    return { report: buildSpellingReport(state.url, state.errors) };
  },
};

// ── Report ───────────────────────────────────────────────────

export function toSpellingFinding(error: SpellingError): SpellingFinding {
  const finding: SpellingFinding = {
    category: 'spelling',
    severity: 'low',
    description: `'${error.original}' → '${error.correction}'`,
    original: error.original,
    correction: error.correction,
    context: error.context,
  };
  if (error.context) finding.location = error.context;
  return finding;
}

export function buildSpellingReport(
  url: string,
  errors: readonly SpellingError[],
): AgentReport<SpellingFinding> {
  if (errors.length === 0) {
    return {
      passed: true,
      headline: 'No spelling errors found',
      text: `✓ SUCCESS: No spelling errors found on ${url}`,
      findings: [],
    };
  }

  const lines = [
    `✗ SPELLING ERRORS DETECTED on ${url}`,
    `Total Errors: ${String(errors.length)}`,
    '',
  ];
  errors.forEach((err, i) => {
    lines.push(`${String(i + 1)}. Error: '${err.original}' → Correction: '${err.correction}'`);
    if (err.context) lines.push(`   Context: "${err.context}"`);
  });

  return {
    passed: false,
    headline: `${String(errors.length)} spelling error${errors.length === 1 ? '' : 's'} found`,
    text: lines.join('\n'),
    findings: errors.map(toSpellingFinding),
  };
}

// ── Definition ───────────────────────────────────────────────

export function createSpellChecker(deps: SpellCheckerDeps): RegisteredAgent {
  return defineAgent<SpellCheckerState>({
    name: SPELL_CHECKER,
    description: 'Finds spelling and grammar mistakes in the visible page text',
    pipeline: new Pipeline([scrapeStep(deps), analyzeStep(deps), reportStep]),

    createInitialState(target) {
      const options = parseOrThrow(
        spellCheckerOptionsSchema,
        target.options ?? {},
        `${SPELL_CHECKER} options for ${target.url}`,
      );
      return {
        url: target.url,
        auth: target.auth,
        maxTextLength: options.maxTextLength ?? deps.settings.maxTextLength,
        waitMs: options.waitMs ?? deps.settings.waitMs,
        rawText: '',
        errors: [],
      };
    },
  });
}
