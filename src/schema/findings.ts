import { z } from 'zod';

// ── Finding (common shape) ──────────────────────────────────

export const findingSeveritySchema = z.enum(['critical', 'high', 'medium', 'low']);

export type FindingSeverity = z.infer<typeof findingSeveritySchema>;

export const SEVERITY_ORDER: readonly FindingSeverity[] = [
  'critical',
  'high',
  'medium',
  'low',
];

export const findingSchema = z.object({
  category: z.string().min(1),
  severity: findingSeveritySchema,
  description: z.string().min(1),
  location: z.string().optional(),
});

export type Finding = z.infer<typeof findingSchema>;

// ── Spelling errors (model output) ──────────────────────────

export const spellingErrorSchema = z.object({
  original: z.string().min(1),
  correction: z.string(),
  context: z.string().optional().default(''),
});

export type SpellingError = z.infer<typeof spellingErrorSchema>;

// ── Visual issues (model output) ────────────────────────────

export const regionSchema = z.object({
  x: z.number().nonnegative(),
  y: z.number().nonnegative(),
  width: z.number().nonnegative(),
  height: z.number().nonnegative(),
});

export type Region = z.infer<typeof regionSchema>;

export const visualIssueSchema = z.object({
  type: z.string().min(1).optional().default('unknown'),
  severity: z
    .preprocess(
      (v) => (typeof v === 'string' ? v.toLowerCase() : v),
      findingSeveritySchema,
    )
    .catch('low'),
  issue: z.string().min(1),
  location: z.string().optional().default('Not specified'),
  recommendation: z.string().optional().default('No recommendation'),
  selector: z.string().nullable().optional(),
  coordinates: regionSchema.nullable().optional(),
});

export type VisualIssue = z.infer<typeof visualIssueSchema>;
