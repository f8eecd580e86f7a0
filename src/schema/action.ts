import { z } from 'zod';

import { TIMEOUTS } from '../config/defaults.js';

// ── Action type discriminator ────────────────────────────────

export const actionTypeSchema = z.enum([
  'click',
  'type',
  'wait',
  'wait_for_selector',
  'scroll',
]);

export type ActionType = z.infer<typeof actionTypeSchema>;

// ── Individual action schemas ────────────────────────────────

const selectorSchema = z.string().min(1);

export const clickActionSchema = z.object({
  type: z.literal('click'),
  selector: selectorSchema,
});

export const typeActionSchema = z.object({
  type: z.literal('type'),
  selector: selectorSchema,
  text: z.string(),
});

export const waitActionSchema = z.object({
  type: z.literal('wait'),
  timeout: z.number().int().nonnegative().default(TIMEOUTS.DEFAULT_WAIT),
});

export const waitForSelectorActionSchema = z.object({
  type: z.literal('wait_for_selector'),
  selector: selectorSchema,
});

export const scrollActionSchema = z.object({
  type: z.literal('scroll'),
});

// ── Union schema ─────────────────────────────────────────────

export const actionSchema = z.discriminatedUnion('type', [
  clickActionSchema,
  typeActionSchema,
  waitActionSchema,
  waitForSelectorActionSchema,
  scrollActionSchema,
]);

export type Action = z.infer<typeof actionSchema>;

export type ClickAction = z.infer<typeof clickActionSchema>;
export type TypeAction = z.infer<typeof typeActionSchema>;
export type WaitAction = z.infer<typeof waitActionSchema>;
export type WaitForSelectorAction = z.infer<typeof waitForSelectorActionSchema>;
export type ScrollAction = z.infer<typeof scrollActionSchema>;

// ── Decoding ─────────────────────────────────────────────────
// Actions arrive as loose JSON and are decoded one at a time, at the
// moment they are about to run, so that a bad entry fails at its own
// index after earlier actions have already been applied.

export type DecodedAction =
  | { readonly kind: 'action'; readonly action: Action }
  | { readonly kind: 'unknown'; readonly type: string };

export type DecodeResult =
  | { readonly ok: true; readonly decoded: DecodedAction }
  | { readonly ok: false; readonly type: string; readonly reason: string };

export function isActionType(value: string): value is ActionType {
  return actionTypeSchema.safeParse(value).success;
}

export function decodeAction(raw: unknown): DecodeResult {
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    return { ok: false, type: 'unknown', reason: 'action must be an object' };
  }

  const type: unknown = 'type' in raw ? raw.type : undefined;
  if (typeof type !== 'string') {
    return { ok: false, type: 'unknown', reason: 'missing required field "type"' };
  }

  if (!isActionType(type)) {
    return { ok: true, decoded: { kind: 'unknown', type } };
  }

  const parsed = actionSchema.safeParse(raw);
  if (!parsed.success) {
    return { ok: false, type, reason: describeIssue(parsed.error) };
  }

  return { ok: true, decoded: { kind: 'action', action: parsed.data } };
}

function describeIssue(error: z.ZodError): string {
  const issue = error.issues[0];
  if (!issue) return 'invalid action';

  const field = issue.path.join('.');
  if (issue.code === 'invalid_type' && issue.received === 'undefined') {
    return `missing required field "${field}"`;
  }
  return `invalid field "${field}": ${issue.message}`;
}
