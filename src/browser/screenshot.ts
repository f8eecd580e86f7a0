import { raceSignal } from '../core/abort.js';
import { CaptureError, TaskCancelledError } from '../core/errors.js';
import { err, ok, toMessage } from '../core/result.js';
import type { Result } from '../core/result.js';
import * as log from '../utils/logger.js';
import type { EnginePage } from './engine.js';

/** Capture the page as PNG, either the viewport or the full scroll height. */
export async function captureScreenshot(
  page: EnginePage,
  fullPage: boolean,
  signal?: AbortSignal,
): Promise<Result<Buffer, CaptureError | TaskCancelledError>> {
  try {
    const png = await raceSignal(page.screenshot(fullPage), signal, (cause) => {
      log.debug(`Screenshot settled after cancellation: ${toMessage(cause)}`);
    });
    if (png.length === 0) {
      return err(new CaptureError('engine returned an empty image'));
    }
    return ok(png);
  } catch (cause) {
    if (cause instanceof TaskCancelledError) return err(cause);
    return err(new CaptureError(toMessage(cause), { cause }));
  }
}
