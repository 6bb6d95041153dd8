import { z } from 'zod';

import { findingSchema } from './findings.js';
import { concurrencyModeSchema } from './config.js';

// ── Version ─────────────────────────────────────────────────
// Bump this when the contract changes.

export const JSON_OUTPUT_VERSION = '1.0' as const;

// ── Run output ──────────────────────────────────────────────

export const jsonOutputErrorSchema = z.object({
  kind: z.enum(['configuration', 'transient', 'permanent', 'parse', 'timeout']),
  message: z.string().min(1),
  step: z.string().nullable(),
  attempts: z.number().int().positive().nullable(),
});

export type JsonOutputError = z.infer<typeof jsonOutputErrorSchema>;

export const jsonOutputRunSchema = z.object({
  index: z.number().int().nonnegative(),
  agent: z.string().min(1),
  url: z.string().min(1),
  status: z.enum(['SUCCEEDED', 'FAILED']),
  durationMs: z.number().int().nonnegative(),
  passed: z.boolean(),
  report: z.string().nullable(),
  findings: z.array(findingSchema.passthrough()),
  error: jsonOutputErrorSchema.nullable(),
});

export type JsonOutputRun = z.infer<typeof jsonOutputRunSchema>;

// ── Summary ─────────────────────────────────────────────────

export const jsonOutputSummarySchema = z.object({
  total: z.number().int().nonnegative(),
  succeeded: z.number().int().nonnegative(),
  failed: z.number().int().nonnegative(),
  totalFindings: z.number().int().nonnegative(),
  findingsByAgent: z.record(z.number().int().nonnegative()),
});

export type JsonOutputSummary = z.infer<typeof jsonOutputSummarySchema>;

// ── Root output ─────────────────────────────────────────────

export const jsonOutputSchema = z.object({
  version: z.literal(JSON_OUTPUT_VERSION),
  runId: z.string().min(1),
  mode: concurrencyModeSchema,
  startedAt: z.string().datetime(),
  finishedAt: z.string().datetime(),
  durationMs: z.number().int().nonnegative(),
  generatedAt: z.string().datetime().optional(),
  summary: jsonOutputSummarySchema,
  results: z.array(jsonOutputRunSchema),
});

export type JsonOutput = z.infer<typeof jsonOutputSchema>;
