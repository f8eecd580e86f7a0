// ── Result ───────────────────────────────────────────────────
// Core operations report failure as a value. Only the transport
// layer decides how a failure is rendered.

export type Ok<T> = { readonly ok: true; readonly value: T };
export type Err<E> = { readonly ok: false; readonly error: E };
export type Result<T, E> = Ok<T> | Err<E>;

export function ok<T>(value: T): Ok<T> {
  return { ok: true, value };
}

export function err<E>(error: E): Err<E> {
  return { ok: false, error };
}

/** Best-effort message for anything caught from the engine. */
export function toMessage(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}
