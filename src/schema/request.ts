import { z } from 'zod';

import { REQUEST_DEFAULTS } from '../config/defaults.js';

// ── Wait policy ──────────────────────────────────────────────

export const waitPolicySchema = z.enum(['load', 'domcontentloaded', 'networkidle']);

export type WaitPolicy = z.infer<typeof waitPolicySchema>;

// ── Shared fields ────────────────────────────────────────────

const urlSchema = z.string().url();

// ── POST /screenshot ─────────────────────────────────────────

export const screenshotRequestSchema = z.object({
  url: urlSchema,
  full_page: z.boolean().default(REQUEST_DEFAULTS.FULL_PAGE),
  width: z.number().int().positive().default(REQUEST_DEFAULTS.WIDTH),
  height: z.number().int().positive().default(REQUEST_DEFAULTS.HEIGHT),
  wait_for: waitPolicySchema.default(REQUEST_DEFAULTS.WAIT_FOR),
});

export type ScreenshotRequest = z.infer<typeof screenshotRequestSchema>;

// ── POST /content ────────────────────────────────────────────

export const contentRequestSchema = z.object({
  url: urlSchema,
  wait_for: waitPolicySchema.default(REQUEST_DEFAULTS.WAIT_FOR),
  selector: z.string().nullish(),
});

export type ContentRequest = z.infer<typeof contentRequestSchema>;

// ── POST /actions ────────────────────────────────────────────
// Entries stay loose here; each is decoded when it runs.

export const actionRequestSchema = z.object({
  url: urlSchema,
  actions: z.array(z.unknown()),
  screenshot_after: z.boolean().default(REQUEST_DEFAULTS.SCREENSHOT_AFTER),
});

export type ActionRequest = z.infer<typeof actionRequestSchema>;
