import { z } from 'zod';

// ── Envelope fields ──────────────────────────────────────────
// Automation failures are reported inside these bodies with
// `success: false`; they never change the HTTP status.

const envelopeFields = {
  success: z.boolean(),
  error: z.string().optional(),
  timestamp: z.string().datetime(),
  url: z.string(),
};

// ── GET / and GET /health ────────────────────────────────────

export const rootResponseSchema = z.object({
  message: z.string(),
  status: z.literal('healthy'),
  timestamp: z.string().datetime(),
  auth_required: z.literal(true),
});

export type RootResponse = z.infer<typeof rootResponseSchema>;

export const healthResponseSchema = z.object({
  status: z.literal('healthy'),
  playwright_initialized: z.boolean(),
  timestamp: z.string().datetime(),
  authenticated: z.literal(true),
  queue: z.object({
    busy: z.boolean(),
    pending: z.number().int().nonnegative(),
  }),
});

export type HealthResponse = z.infer<typeof healthResponseSchema>;

// ── Task responses ───────────────────────────────────────────

export const screenshotResponseSchema = z.object({
  ...envelopeFields,
  image_base64: z.string().optional(),
});

export type ScreenshotResponse = z.infer<typeof screenshotResponseSchema>;

export const contentResponseSchema = z.object({
  ...envelopeFields,
  content: z.string().optional(),
  title: z.string().optional(),
});

export type ContentResponse = z.infer<typeof contentResponseSchema>;

export const actionResponseSchema = z.object({
  ...envelopeFields,
  result: z
    .object({
      actions_performed: z.array(z.string()),
    })
    .optional(),
  screenshot_base64: z.string().optional(),
});

export type ActionResponse = z.infer<typeof actionResponseSchema>;

export const saveSessionResponseSchema = z.object({
  success: z.boolean(),
  saved: z.boolean(),
  storage_path: z.string().optional(),
  error: z.string().optional(),
  timestamp: z.string().datetime(),
});

export type SaveSessionResponse = z.infer<typeof saveSessionResponseSchema>;

// ── Transport errors (401 / 400 / 404 / 413) ─────────────────

export const errorResponseSchema = z.object({
  detail: z.string(),
  issues: z.array(z.string()).optional(),
});

export type ErrorResponse = z.infer<typeof errorResponseSchema>;
