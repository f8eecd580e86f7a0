// ── Error taxonomy ───────────────────────────────────────────
// Every failure a task can end with. Each class carries a literal
// `kind` so callers can switch on it without instanceof chains.

export type NavigationPhase = 'navigate' | 'wait';

export type CancelReason = 'aborted' | 'deadline';

export class EngineInitError extends Error {
  readonly kind = 'engine_init' as const;

  constructor(reason: string, options?: { cause?: unknown }) {
    super(`Failed to launch browser: ${reason}`, options);
    this.name = 'EngineInitError';
  }
}

export class EngineLoadError extends Error {
  readonly kind = 'engine_load' as const;
  readonly storagePath: string;

  constructor(storagePath: string, reason: string, options?: { cause?: unknown }) {
    super(`Failed to restore browser context from ${storagePath}: ${reason}`, options);
    this.name = 'EngineLoadError';
    this.storagePath = storagePath;
  }
}

export class NavigationError extends Error {
  readonly kind = 'navigation' as const;
  readonly url: string;
  readonly phase: NavigationPhase;

  constructor(url: string, phase: NavigationPhase, reason: string, options?: { cause?: unknown }) {
    const what = phase === 'navigate' ? 'Navigation to' : 'Waiting for readiness of';
    super(`${what} ${url} failed: ${reason}`, options);
    this.name = 'NavigationError';
    this.url = url;
    this.phase = phase;
  }
}

export class ActionExecutionError extends Error {
  readonly kind = 'action' as const;
  readonly index: number;
  readonly actionType: string;

  constructor(index: number, actionType: string, reason: string, options?: { cause?: unknown }) {
    super(`Action ${String(index)} (${actionType}) failed: ${reason}`, options);
    this.name = 'ActionExecutionError';
    this.index = index;
    this.actionType = actionType;
  }
}

export class CaptureError extends Error {
  readonly kind = 'capture' as const;

  constructor(reason: string, options?: { cause?: unknown }) {
    super(`Screenshot failed: ${reason}`, options);
    this.name = 'CaptureError';
  }
}

export class ExtractionError extends Error {
  readonly kind = 'extraction' as const;

  constructor(reason: string, options?: { cause?: unknown }) {
    super(`Content extraction failed: ${reason}`, options);
    this.name = 'ExtractionError';
  }
}

export class StorageError extends Error {
  readonly kind = 'storage' as const;
  readonly storagePath: string;

  constructor(storagePath: string, reason: string, options?: { cause?: unknown }) {
    super(`Failed to save storage state to ${storagePath}: ${reason}`, options);
    this.name = 'StorageError';
    this.storagePath = storagePath;
  }
}

export class TaskCancelledError extends Error {
  readonly kind = 'cancelled' as const;
  readonly reason: CancelReason;

  constructor(reason: CancelReason) {
    super(
      reason === 'deadline'
        ? 'Task exceeded its deadline and was cancelled'
        : 'Task was cancelled by the caller',
    );
    this.name = 'TaskCancelledError';
    this.reason = reason;
  }
}

export type AutomationError =
  | EngineInitError
  | EngineLoadError
  | NavigationError
  | ActionExecutionError
  | CaptureError
  | ExtractionError
  | StorageError
  | TaskCancelledError;

export type AutomationErrorKind = AutomationError['kind'];
