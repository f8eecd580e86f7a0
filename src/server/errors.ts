import type { ZodError } from 'zod';

// ── Transport errors ─────────────────────────────────────────
// The only failures that change the HTTP status. Automation
// failures never come through here.

export class HttpError extends Error {
  readonly status: number;
  readonly issues: readonly string[] | undefined;

  constructor(status: number, detail: string, issues?: readonly string[]) {
    super(detail);
    this.name = 'HttpError';
    this.status = status;
    this.issues = issues;
  }
}

export function validationError(error: ZodError): HttpError {
  const issues = error.issues.map((issue) => {
    const field = issue.path.length > 0 ? issue.path.join('.') : '(body)';
    return `${field}: ${issue.message}`;
  });
  return new HttpError(400, 'Invalid request body', issues);
}
