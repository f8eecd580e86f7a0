import { raceSignal } from '../core/abort.js';
import { ExtractionError, TaskCancelledError } from '../core/errors.js';
import { err, ok, toMessage } from '../core/result.js';
import type { Result } from '../core/result.js';
import * as log from '../utils/logger.js';
import type { EnginePage } from './engine.js';

// ── Public types ─────────────────────────────────────────────

export interface PageContent {
  title: string;
  content: string;
}

export function missingSelectorMessage(selector: string): string {
  return `Element with selector '${selector}' not found`;
}

// ── Extraction ───────────────────────────────────────────────

/**
 * Read the page title plus either the whole document or the inner
 * HTML of the first element matching `selector`. A selector that
 * matches nothing yields a sentinel message, not an error.
 */
export async function extractContent(
  page: EnginePage,
  selector?: string,
  signal?: AbortSignal,
): Promise<Result<PageContent, ExtractionError | TaskCancelledError>> {
  const race = <T>(work: Promise<T>): Promise<T> =>
    raceSignal(work, signal, (cause) => {
      log.debug(`Extraction settled after cancellation: ${toMessage(cause)}`);
    });

  try {
    const title = await race(page.title());

    if (!selector) {
      return ok({ title, content: await race(page.content()) });
    }

    const element = await race(page.$(selector));
    const content = element
      ? await race(element.innerHTML())
      : missingSelectorMessage(selector);

    return ok({ title, content });
  } catch (cause) {
    if (cause instanceof TaskCancelledError) return err(cause);
    return err(new ExtractionError(toMessage(cause), { cause }));
  }
}
