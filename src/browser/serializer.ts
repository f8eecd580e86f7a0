import { cancellationOf } from '../core/abort.js';

// ── Permit ───────────────────────────────────────────────────

export interface TaskPermit {
  /** Hand the lane to the next waiter. Releasing twice is a no-op. */
  release(): void;
}

interface Waiter {
  grant(permit: TaskPermit): void;
}

// ── Serializer ───────────────────────────────────────────────

/**
 * Binary semaphore in front of the shared browser context.
 *
 * Capacity is fixed at one: every task touching the browser runs on a
 * single lane, waiters are granted in arrival order. Not reentrant; a
 * holder that calls `acquire` again waits on itself forever.
 */
export class TaskSerializer {
  private holder: TaskPermit | null = null;
  private readonly waiters: Waiter[] = [];
  private acquiredCount = 0;
  private releasedCount = 0;

  get busy(): boolean {
    return this.holder !== null;
  }

  get pending(): number {
    return this.waiters.length;
  }

  get acquired(): number {
    return this.acquiredCount;
  }

  get released(): number {
    return this.releasedCount;
  }

  /**
   * Resolve with the permit once the lane is free. Rejects with a
   * TaskCancelledError if `signal` aborts while still queued.
   */
  acquire(signal?: AbortSignal): Promise<TaskPermit> {
    if (signal?.aborted) return Promise.reject(cancellationOf(signal));

    if (this.holder === null) {
      return Promise.resolve(this.grant());
    }

    return new Promise<TaskPermit>((resolve, reject) => {
      const waiter: Waiter = {
        grant: (permit) => {
          signal?.removeEventListener('abort', onAbort);
          resolve(permit);
        },
      };

      const onAbort = (): void => {
        const index = this.waiters.indexOf(waiter);
        if (index !== -1) this.waiters.splice(index, 1);
        if (signal) reject(cancellationOf(signal));
      };

      signal?.addEventListener('abort', onAbort, { once: true });
      this.waiters.push(waiter);
    });
  }

  /** Run `fn` holding the permit; the permit is released on every path. */
  async run<T>(fn: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    const permit = await this.acquire(signal);
    try {
      return await fn();
    } finally {
      permit.release();
    }
  }

  // ── Internals ──────────────────────────────────────────────

  private grant(): TaskPermit {
    let released = false;
    const permit: TaskPermit = {
      release: () => {
        if (released) return;
        released = true;
        this.handOff(permit);
      },
    };

    this.holder = permit;
    this.acquiredCount++;
    return permit;
  }

  private handOff(permit: TaskPermit): void {
    if (this.holder !== permit) return;
    this.holder = null;
    this.releasedCount++;

    const next = this.waiters.shift();
    if (next) next.grant(this.grant());
  }
}
