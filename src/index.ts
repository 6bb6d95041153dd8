/**
 * pagecheck public API.
 * The CLI is one consumer; embedders build a registry and orchestrator
 * from the same pieces.
 */

export * from './core/index.js';
export * from './schema/index.js';
export {
  createAgentRegistry,
  createSpellChecker,
  createVisualQa,
  SPELL_CHECKER,
  VISUAL_QA,
} from './agents/index.js';
export type {
  AgentDependencies,
  RetryHooks,
  SpellCheckerState,
  SpellingFinding,
  VisualFinding,
  VisualQaState,
} from './agents/index.js';
export { createPlaywrightScraper } from './browser/index.js';
export type { PageOptions, PageScraper, RegionRequest } from './browser/index.js';
export { createLLMClient, createMockClient, loadLLMConfig } from './llm/index.js';
export type { LLMClient, LLMConfig, LLMProvider } from './llm/index.js';
export {
  defaultConfig,
  findConfigFile,
  loadConfigFile,
  parseConfigSource,
  resolveTargets,
} from './config/index.js';
export { buildReportFilename, renderReport } from './report/index.js';
export { runCheck } from './cli/index.js';
