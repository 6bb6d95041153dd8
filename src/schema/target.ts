import { z } from 'zod';

import { VIEWPORT, VIEWPORT_LIMITS } from '../config/defaults.js';

// ── Auth descriptor ─────────────────────────────────────────
// Opaque to the orchestrator: handed to the agent's state factory
// unchanged and only interpreted by the browser layer.

export const authConfigSchema = z.object({
  cookie: z.string().min(1).optional(),
  headers: z.record(z.string()).optional(),
  basic: z
    .object({
      username: z.string().min(1),
      password: z.string(),
    })
    .optional(),
});

export type AuthConfig = z.infer<typeof authConfigSchema>;

// ── Viewport ────────────────────────────────────────────────

export const viewportSchema = z.object({
  name: z.string().min(1).optional(),
  width: z
    .number()
    .int()
    .min(VIEWPORT_LIMITS.MIN_WIDTH)
    .max(VIEWPORT_LIMITS.MAX_WIDTH)
    .default(VIEWPORT.WIDTH),
  height: z
    .number()
    .int()
    .min(VIEWPORT_LIMITS.MIN_HEIGHT)
    .max(VIEWPORT_LIMITS.MAX_HEIGHT)
    .default(VIEWPORT.HEIGHT),
});

export type Viewport = z.infer<typeof viewportSchema>;

// ── Target ──────────────────────────────────────────────────
// The address is only checked for presence here; it is validated and
// normalized once, when the orchestrator admits the target.

export const targetSchema = z.object({
  url: z.string().min(1),
  agents: z.array(z.string().min(1)).default([]),
  auth: authConfigSchema.optional(),
  options: z.record(z.unknown()).optional(),
});

export type Target = z.infer<typeof targetSchema>;
