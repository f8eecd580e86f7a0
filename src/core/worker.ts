import { TIMEOUTS, REQUEST_DEFAULTS } from '../config/defaults.js';
import { runActions } from '../browser/actions.js';
import { extractContent } from '../browser/content.js';
import type { PageContent } from '../browser/content.js';
import type { EngineContext, EnginePage, Viewport } from '../browser/engine.js';
import { withPage } from '../browser/page.js';
import { captureScreenshot } from '../browser/screenshot.js';
import { TaskSerializer } from '../browser/serializer.js';
import type { SessionManager } from '../browser/session.js';
import type { WaitPolicy } from '../schema/request.js';
import * as log from '../utils/logger.js';
import { raceSignal } from './abort.js';
import { StorageError, TaskCancelledError } from './errors.js';
import type { AutomationError } from './errors.js';
import { err, ok, toMessage } from './result.js';
import type { Result } from './result.js';

// ── Public types ─────────────────────────────────────────────

export interface TaskOptions {
  /** Aborts the task, e.g. when the client disconnects. */
  signal?: AbortSignal | undefined;
}

export interface ScreenshotTask {
  url: string;
  fullPage: boolean;
  viewport: Viewport;
  waitFor: WaitPolicy;
}

export interface ContentTask {
  url: string;
  waitFor: WaitPolicy;
  selector?: string | undefined;
}

export interface ActionTask {
  url: string;
  actions: readonly unknown[];
  screenshotAfter: boolean;
}

export interface ActionOutcome {
  trace: readonly string[];
  screenshot: Buffer | null;
}

export interface ActionTaskFailure {
  error: AutomationError;
  /** Actions that completed before the failure. */
  trace: readonly string[];
}

export interface WorkerOptions {
  /** Hard upper bound on one task, queueing included. */
  taskTimeoutMs?: number;
}

export interface WorkerStatus {
  initialized: boolean;
  busy: boolean;
  pending: number;
}

// ── Worker ───────────────────────────────────────────────────

/**
 * Runs automation tasks against the shared browser session, one at a
 * time. Each task: init session → acquire lane → open page → operate →
 * close page → release lane.
 */
export class BrowserWorker {
  readonly session: SessionManager;
  readonly serializer: TaskSerializer;
  private readonly taskTimeoutMs: number;

  constructor(
    session: SessionManager,
    serializer: TaskSerializer = new TaskSerializer(),
    options: WorkerOptions = {},
  ) {
    this.session = session;
    this.serializer = serializer;
    this.taskTimeoutMs = options.taskTimeoutMs ?? TIMEOUTS.TASK_TIMEOUT;
  }

  status(): WorkerStatus {
    return {
      initialized: this.session.initialized,
      busy: this.serializer.busy,
      pending: this.serializer.pending,
    };
  }

  takeScreenshot(
    task: ScreenshotTask,
    options: TaskOptions = {},
  ): Promise<Result<Buffer, AutomationError>> {
    return this.runTask('screenshot', task.url, options, (context, signal) =>
      withPage(
        context,
        { url: task.url, waitFor: task.waitFor, viewport: task.viewport },
        (page) => captureScreenshot(page, task.fullPage, signal),
        signal,
      ),
    );
  }

  getContent(
    task: ContentTask,
    options: TaskOptions = {},
  ): Promise<Result<PageContent, AutomationError>> {
    return this.runTask('content', task.url, options, (context, signal) =>
      withPage(
        context,
        { url: task.url, waitFor: task.waitFor },
        (page) => extractContent(page, task.selector, signal),
        signal,
      ),
    );
  }

  async performActions(
    task: ActionTask,
    options: TaskOptions = {},
  ): Promise<Result<ActionOutcome, ActionTaskFailure>> {
    let trace: readonly string[] = [];

    const operate = async (
      page: EnginePage,
      signal: AbortSignal,
    ): Promise<Result<ActionOutcome, AutomationError>> => {
      const run = await runActions(page, task.actions, signal);
      trace = run.trace;
      if (run.failure) return err(run.failure);

      if (!task.screenshotAfter) return ok({ trace, screenshot: null });

      const shot = await captureScreenshot(page, true, signal);
      if (!shot.ok) return shot;
      return ok({ trace, screenshot: shot.value });
    };

    const result = await this.runTask('actions', task.url, options, (context, signal) =>
      withPage(
        context,
        { url: task.url, waitFor: REQUEST_DEFAULTS.WAIT_FOR },
        (page) => operate(page, signal),
        signal,
      ),
    );

    return result.ok ? result : err({ error: result.error, trace });
  }

  /**
   * Persist the context's storage state on the lane, so no task is
   * mid-flight while cookies are read.
   */
  async saveStorage(options: TaskOptions = {}): Promise<Result<boolean, StorageError | TaskCancelledError>> {
    try {
      return await this.serializer.run(async () => {
        try {
          return ok(await this.session.saveStorage());
        } catch (cause) {
          const path = this.session.storagePath ?? '(none)';
          return err(new StorageError(path, toMessage(cause), { cause }));
        }
      }, options.signal);
    } catch (cause) {
      if (cause instanceof TaskCancelledError) return err(cause);
      throw cause;
    }
  }

  /** Wait for the lane, then tear the session down. */
  async close(): Promise<void> {
    await this.serializer.run(() => this.session.close());
  }

  // ── Internals ──────────────────────────────────────────────

  private async runTask<T>(
    name: string,
    url: string,
    options: TaskOptions,
    body: (context: EngineContext, signal: AbortSignal) => Promise<Result<T, AutomationError>>,
  ): Promise<Result<T, AutomationError>> {
    const started = Date.now();
    const deadline = this.deadlineFor(options.signal);

    try {
      const session = await raceSignal(this.session.ensureInitialized(), deadline.signal);
      if (!session.ok) return session;

      const result = await this.serializer.run(
        () => body(session.value.context, deadline.signal),
        deadline.signal,
      );

      log.task(name, url, result.ok, Date.now() - started);
      if (!result.ok) log.detail(result.error.message);
      return result;
    } catch (cause) {
      if (cause instanceof TaskCancelledError) {
        log.task(name, url, false, Date.now() - started);
        log.detail(cause.message);
        return err(cause);
      }
      throw cause;
    } finally {
      deadline.dispose();
    }
  }

  private deadlineFor(parent: AbortSignal | undefined): {
    signal: AbortSignal;
    dispose: () => void;
  } {
    const controller = new AbortController();

    const timer = setTimeout(() => {
      controller.abort(new TaskCancelledError('deadline'));
    }, this.taskTimeoutMs);
    timer.unref();

    const onParentAbort = (): void => {
      controller.abort(new TaskCancelledError('aborted'));
    };
    if (parent?.aborted) onParentAbort();
    else parent?.addEventListener('abort', onParentAbort, { once: true });

    return {
      signal: controller.signal,
      dispose: () => {
        clearTimeout(timer);
        parent?.removeEventListener('abort', onParentAbort);
      },
    };
  }
}
