import { describe, it, expect } from 'vitest';

import { AUTH_MESSAGES, authenticate, extractCredential, secretsMatch } from '../../src/server/auth.js';

const SECRET = 'test-secret';

describe('extractCredential', () => {
  it('prefers the X-API-Key header', () => {
    expect(extractCredential({ 'x-api-key': 'from-header', authorization: 'Bearer from-bearer' })).toBe('from-header');
  });

  it('falls back to a bearer token', () => {
    expect(extractCredential({ authorization: 'Bearer abc123' })).toBe('abc123');
    expect(extractCredential({ authorization: 'bearer abc123' })).toBe('abc123');
  });

  it('ignores other authorization schemes', () => {
    expect(extractCredential({ authorization: 'Basic dXNlcjpwYXNz' })).toBeUndefined();
  });

  it('returns undefined when nothing is presented', () => {
    expect(extractCredential({})).toBeUndefined();
  });
});

describe('secretsMatch', () => {
  it('compares exact values only', () => {
    expect(secretsMatch(SECRET, SECRET)).toBe(true);
    expect(secretsMatch('test-secre', SECRET)).toBe(false);
    expect(secretsMatch(`${SECRET}x`, SECRET)).toBe(false);
  });
});

describe('authenticate', () => {
  it('accepts the secret from either header', () => {
    expect(authenticate({ 'x-api-key': SECRET }, SECRET)).toEqual({ ok: true });
    expect(authenticate({ authorization: `Bearer ${SECRET}` }, SECRET)).toEqual({ ok: true });
  });

  it('explains a missing credential', () => {
    expect(authenticate({}, SECRET)).toEqual({ ok: false, detail: AUTH_MESSAGES.MISSING });
  });

  it('explains a wrong credential', () => {
    expect(authenticate({ 'x-api-key': 'wrong' }, SECRET)).toEqual({ ok: false, detail: AUTH_MESSAGES.INVALID });
  });
});
