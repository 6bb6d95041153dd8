/**
 * Built-in agents.
 * Each agent is a linear pipeline over its own state; the registry is
 * populated here once at startup and frozen before any run begins.
 */

import { AgentRegistry } from '../core/registry.js';
import { RetryPolicy } from '../core/retry.js';
import type { RetryPolicyOptions } from '../core/retry.js';
import type { PageScraper } from '../browser/index.js';
import type { LLMClient } from '../llm/index.js';
import type { AgentsConfig, RetryConfig } from '../schema/index.js';
import { createSpellChecker } from './spellChecker.js';
import { createVisualQa } from './visualQa.js';

export { createSpellChecker, buildSpellingReport, toSpellingFinding, SPELL_CHECKER } from './spellChecker.js';
export type { SpellCheckerState, SpellingFinding, SpellCheckerDeps } from './spellChecker.js';
export { createVisualQa, buildVisualReport, toVisualFinding, VISUAL_QA } from './visualQa.js';
export type { VisualQaState, VisualFinding, VisualQaDeps } from './visualQa.js';
export { parseFindingList } from './parse.js';
export { loadPrompt, renderPrompt } from './prompts.js';
export type { PromptName } from './prompts.js';

// ── Registry population ──────────────────────────────────────

export type RetryHooks = Pick<RetryPolicyOptions, 'isRetryable' | 'sleep' | 'random' | 'onRetry'>;

export interface AgentDependencies {
  scraper: PageScraper;
  llm: LLMClient;
  agents: AgentsConfig;
  retry: RetryConfig;
  /** Test seam: replaces backoff sleeps, jitter source, etc. */
  retryHooks?: RetryHooks | undefined;
}

export function createAgentRegistry(deps: AgentDependencies): AgentRegistry {
  const { scraper, llm, agents, retry, retryHooks } = deps;

  return new AgentRegistry()
    .register(
      createSpellChecker({
        scraper,
        llm,
        settings: agents.spell_checker,
        retry: RetryPolicy.fromConfig(retry, agents.spell_checker.retry, retryHooks),
      }),
    )
    .register(
      createVisualQa({
        scraper,
        llm,
        settings: agents.visual_qa,
        retry: RetryPolicy.fromConfig(retry, agents.visual_qa.retry, retryHooks),
      }),
    )
    .freeze();
}
