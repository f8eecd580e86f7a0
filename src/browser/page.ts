import { TIMEOUTS } from '../config/defaults.js';
import { cancellationOf, raceSignal } from '../core/abort.js';
import { NavigationError, TaskCancelledError } from '../core/errors.js';
import { err, ok, toMessage } from '../core/result.js';
import type { Result } from '../core/result.js';
import type { WaitPolicy } from '../schema/request.js';
import * as log from '../utils/logger.js';
import type { EngineContext, EnginePage, Viewport } from './engine.js';

// ── Public types ─────────────────────────────────────────────

export interface OpenPageOptions {
  url: string;
  waitFor: WaitPolicy;
  viewport?: Viewport | undefined;
}

export interface PageHandle {
  readonly page: EnginePage;
  readonly url: string;
  /** Close the page. Only the first call reaches the engine. */
  close(): Promise<void>;
}

export type OpenPageError = NavigationError | TaskCancelledError;

// ── Open / close ─────────────────────────────────────────────

/**
 * Open a fresh page, navigate, and wait for the readiness state.
 * On failure the page is already closed when the error comes back.
 */
export async function openPage(
  context: EngineContext,
  options: OpenPageOptions,
  signal?: AbortSignal,
): Promise<Result<PageHandle, OpenPageError>> {
  const { url } = options;
  const lateFailure = (cause: unknown): void => {
    log.debug(`Engine call settled after cancellation: ${toMessage(cause)}`);
  };

  let page: EnginePage;
  try {
    page = await context.newPage();
  } catch (cause) {
    return err(new NavigationError(url, 'navigate', `could not open page: ${toMessage(cause)}`, { cause }));
  }

  const handle = createHandle(page, url);
  if (signal?.aborted) {
    await handle.close();
    return err(cancellationOf(signal));
  }

  try {
    if (options.viewport) {
      await raceSignal(page.setViewportSize(options.viewport), signal, lateFailure);
    }
    await raceSignal(page.goto(url, TIMEOUTS.NAVIGATION_TIMEOUT), signal, lateFailure);
  } catch (cause) {
    await handle.close();
    if (cause instanceof TaskCancelledError) return err(cause);
    return err(new NavigationError(url, 'navigate', toMessage(cause), { cause }));
  }

  try {
    await raceSignal(
      page.waitForLoadState(options.waitFor, TIMEOUTS.READINESS_TIMEOUT),
      signal,
      lateFailure,
    );
  } catch (cause) {
    await handle.close();
    if (cause instanceof TaskCancelledError) return err(cause);
    return err(new NavigationError(url, 'wait', toMessage(cause), { cause }));
  }

  return ok(handle);
}

/**
 * Open a page, hand it to `fn`, and close it afterwards whatever
 * `fn` returns or throws.
 */
export async function withPage<T, E>(
  context: EngineContext,
  options: OpenPageOptions,
  fn: (page: EnginePage) => Promise<Result<T, E>>,
  signal?: AbortSignal,
): Promise<Result<T, E | OpenPageError>> {
  const opened = await openPage(context, options, signal);
  if (!opened.ok) return opened;

  const handle = opened.value;
  try {
    return await fn(handle.page);
  } finally {
    await handle.close();
  }
}

function createHandle(page: EnginePage, url: string): PageHandle {
  let closing: Promise<void> | null = null;

  return {
    page,
    url,
    close(): Promise<void> {
      closing ??= page.close().catch((cause: unknown) => {
        log.warn(`Closing page for ${url} failed: ${toMessage(cause)}`);
      });
      return closing;
    },
  };
}
