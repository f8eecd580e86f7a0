import { createHash, timingSafeEqual } from 'node:crypto';
import type { IncomingHttpHeaders } from 'node:http';

// ── Public types ─────────────────────────────────────────────

export type AuthResult =
  | { readonly ok: true }
  | { readonly ok: false; readonly detail: string };

export const AUTH_MESSAGES = {
  MISSING: 'X-API-Key header or Bearer token missing',
  INVALID: 'Invalid API key',
} as const;

// ── Credential lookup ────────────────────────────────────────

/**
 * Pull the presented secret from `X-API-Key`, falling back to an
 * `Authorization: Bearer <secret>` header.
 */
export function extractCredential(headers: IncomingHttpHeaders): string | undefined {
  const apiKey = headers['x-api-key'];
  const key = Array.isArray(apiKey) ? apiKey[0] : apiKey;
  if (key) return key;

  const authorization = headers.authorization;
  if (!authorization) return undefined;

  const match = /^Bearer\s+(\S+)\s*$/i.exec(authorization);
  return match?.[1];
}

/** Constant-time comparison; digests first so lengths never leak. */
export function secretsMatch(presented: string, expected: string): boolean {
  const a = createHash('sha256').update(presented).digest();
  const b = createHash('sha256').update(expected).digest();
  return timingSafeEqual(a, b);
}

export function authenticate(headers: IncomingHttpHeaders, secret: string): AuthResult {
  const presented = extractCredential(headers);
  if (presented === undefined) {
    return { ok: false, detail: AUTH_MESSAGES.MISSING };
  }
  if (!secretsMatch(presented, secret)) {
    return { ok: false, detail: AUTH_MESSAGES.INVALID };
  }
  return { ok: true };
}
