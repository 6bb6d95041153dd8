import { z } from 'zod';

import {
  CONCURRENCY,
  LIMITS,
  RETRY,
  TIMEOUTS,
} from '../config/defaults.js';
import { targetSchema, viewportSchema } from './target.js';

// ── Retry tunables ──────────────────────────────────────────

export const retryConfigSchema = z.object({
  maxAttempts: z.number().int().min(1).optional().default(RETRY.MAX_ATTEMPTS),
  initialDelayMs: z.number().positive().optional().default(RETRY.INITIAL_DELAY_MS),
  exponentialBase: z.number().gt(1).optional().default(RETRY.EXPONENTIAL_BASE),
  maxDelayMs: z.number().positive().optional().default(RETRY.MAX_DELAY_MS),
  jitterFactor: z.number().min(0).max(1).optional().default(RETRY.JITTER_FACTOR),
});

export type RetryConfig = z.infer<typeof retryConfigSchema>;

/** Per-agent override: any field left out falls back to the global block. */
export const retryOverrideSchema = z.object({
  maxAttempts: z.number().int().min(1).optional(),
  initialDelayMs: z.number().positive().optional(),
  exponentialBase: z.number().gt(1).optional(),
  maxDelayMs: z.number().positive().optional(),
  jitterFactor: z.number().min(0).max(1).optional(),
});

export type RetryOverride = z.infer<typeof retryOverrideSchema>;

// ── LLM block ───────────────────────────────────────────────

export const modelNameSchema = z
  .string()
  .regex(/^[a-zA-Z0-9\-./]+$/, 'Invalid model name format');

export const llmSettingsSchema = z.object({
  provider: z.enum(['anthropic', 'openai', 'mock']).optional(),
  model: modelNameSchema.optional(),
});

export type LLMSettings = z.infer<typeof llmSettingsSchema>;

// ── Concurrency block ───────────────────────────────────────

export const concurrencyModeSchema = z.enum(['sequential', 'parallel']);

export type ConcurrencyMode = z.infer<typeof concurrencyModeSchema>;

export const concurrencyConfigSchema = z.object({
  mode: concurrencyModeSchema.optional().default('sequential'),
  maxParallel: z.number().int().positive().optional().default(CONCURRENCY.MAX_PARALLEL),
  runTimeoutMs: z.number().int().positive().optional(),
});

export type ConcurrencyConfig = z.infer<typeof concurrencyConfigSchema>;

// ── Browser block ───────────────────────────────────────────

export const browserConfigSchema = z.object({
  headless: z.boolean().optional().default(true),
  navigationTimeoutMs: z
    .number()
    .int()
    .positive()
    .optional()
    .default(TIMEOUTS.NAVIGATION_TIMEOUT),
});

export type BrowserConfig = z.infer<typeof browserConfigSchema>;

// ── Agent blocks ────────────────────────────────────────────

export const spellCheckerSettingsSchema = z.object({
  enabled: z.boolean().optional().default(true),
  maxTextLength: z.number().int().positive().optional().default(LIMITS.MAX_TEXT_LENGTH),
  waitMs: z.number().int().nonnegative().optional().default(TIMEOUTS.TEXT_SETTLE_WAIT),
  retry: retryOverrideSchema.optional(),
});

export type SpellCheckerSettings = z.infer<typeof spellCheckerSettingsSchema>;

export const visualQaSettingsSchema = z.object({
  enabled: z.boolean().optional().default(true),
  viewport: viewportSchema.optional().default({}),
  waitMs: z.number().int().nonnegative().optional().default(TIMEOUTS.SCREENSHOT_SETTLE_WAIT),
  retry: retryOverrideSchema.optional(),
});

export type VisualQaSettings = z.infer<typeof visualQaSettingsSchema>;

export const agentsConfigSchema = z
  .object({
    spell_checker: spellCheckerSettingsSchema.optional().default({}),
    visual_qa: visualQaSettingsSchema.optional().default({}),
  })
  .strict();

export type AgentsConfig = z.infer<typeof agentsConfigSchema>;

// ── Output block ────────────────────────────────────────────

export const reportFormatSchema = z.enum(['text', 'json', 'markdown', 'html']);

export type ReportFormat = z.infer<typeof reportFormatSchema>;

export const outputConfigSchema = z.object({
  format: reportFormatSchema.optional().default('text'),
  path: z.string().min(1).optional(),
  timestamp: z.boolean().optional().default(true),
});

export type OutputConfig = z.infer<typeof outputConfigSchema>;

// ── Full config file ────────────────────────────────────────

export const fileConfigSchema = z.object({
  llm: llmSettingsSchema.optional().default({}),
  retry: retryConfigSchema.optional().default({}),
  concurrency: concurrencyConfigSchema.optional().default({}),
  browser: browserConfigSchema.optional().default({}),
  agents: agentsConfigSchema.optional().default({}),
  targets: z.array(targetSchema).optional().default([]),
  output: outputConfigSchema.optional().default({}),
});

export type FileConfig = z.infer<typeof fileConfigSchema>;
