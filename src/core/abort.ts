import { TaskCancelledError } from './errors.js';

// ── Cancellation ─────────────────────────────────────────────

/** The cancellation error carried by (or implied by) an aborted signal. */
export function cancellationOf(signal: AbortSignal): TaskCancelledError {
  const reason: unknown = signal.reason;
  return reason instanceof TaskCancelledError
    ? reason
    : new TaskCancelledError('aborted');
}

/**
 * Settle with `work` unless `signal` aborts first, in which case reject
 * with a TaskCancelledError. The engine call keeps running; callers close
 * the page afterwards, which makes it settle. A failure that arrives
 * after cancellation goes to `onLateFailure`.
 */
export function raceSignal<T>(
  work: Promise<T>,
  signal: AbortSignal | undefined,
  onLateFailure?: (cause: unknown) => void,
): Promise<T> {
  if (!signal) return work;

  return new Promise<T>((resolve, reject) => {
    let settled = false;

    const onAbort = (): void => {
      settled = true;
      reject(cancellationOf(signal));
    };

    if (signal.aborted) onAbort();
    else signal.addEventListener('abort', onAbort, { once: true });

    work.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        if (settled) return;
        settled = true;
        resolve(value);
      },
      (cause: unknown) => {
        signal.removeEventListener('abort', onAbort);
        if (settled) {
          onLateFailure?.(cause);
          return;
        }
        settled = true;
        reject(cause);
      },
    );
  });
}
