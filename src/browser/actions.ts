import { TIMEOUTS } from '../config/defaults.js';
import { cancellationOf, raceSignal } from '../core/abort.js';
import { ActionExecutionError, TaskCancelledError } from '../core/errors.js';
import { toMessage } from '../core/result.js';
import { decodeAction } from '../schema/action.js';
import type { Action } from '../schema/action.js';
import * as log from '../utils/logger.js';
import type { EnginePage } from './engine.js';

const SCROLL_TO_BOTTOM = 'window.scrollTo(0, document.body.scrollHeight)';

// ── Public types ─────────────────────────────────────────────

export type ActionFailure = ActionExecutionError | TaskCancelledError;

export interface ActionRun {
  /** One line per action that completed, in order. */
  readonly trace: readonly string[];
  /** Set when the run stopped early; `trace` still holds what ran. */
  readonly failure: ActionFailure | null;
}

// ── Interpreter ──────────────────────────────────────────────

/**
 * Execute `inputs` against `page` strictly in order, stopping at the
 * first action that cannot be decoded or fails against the page.
 * Entries with an unrecognized `type` are logged and skipped.
 */
export async function runActions(
  page: EnginePage,
  inputs: readonly unknown[],
  signal?: AbortSignal,
): Promise<ActionRun> {
  const trace: string[] = [];

  for (const [index, input] of inputs.entries()) {
    if (signal?.aborted) return { trace, failure: cancellationOf(signal) };

    const decoded = decodeAction(input);
    if (!decoded.ok) {
      return {
        trace,
        failure: new ActionExecutionError(index, decoded.type, decoded.reason),
      };
    }

    if (decoded.decoded.kind === 'unknown') {
      log.warn(`Skipping action ${String(index)}: unknown type "${decoded.decoded.type}"`);
      continue;
    }

    const action = decoded.decoded.action;
    try {
      await raceSignal(performAction(page, action), signal, (cause) => {
        log.debug(`Action ${String(index)} settled after cancellation: ${toMessage(cause)}`);
      });
    } catch (cause) {
      if (cause instanceof TaskCancelledError) return { trace, failure: cause };
      return {
        trace,
        failure: new ActionExecutionError(index, action.type, toMessage(cause), { cause }),
      };
    }

    trace.push(describeAction(action));
    log.detail(`[${String(index + 1)}/${String(inputs.length)}] ${describeAction(action)}`);
  }

  return { trace, failure: null };
}

// ── Dispatch ─────────────────────────────────────────────────

async function performAction(page: EnginePage, action: Action): Promise<void> {
  switch (action.type) {
    case 'click':
      await page.click(action.selector, TIMEOUTS.ACTION_TIMEOUT);
      break;

    case 'type':
      await page.fill(action.selector, action.text, TIMEOUTS.ACTION_TIMEOUT);
      break;

    case 'wait':
      await page.waitForTimeout(action.timeout);
      break;

    case 'wait_for_selector':
      await page.waitForSelector(action.selector, TIMEOUTS.SELECTOR_TIMEOUT);
      break;

    case 'scroll':
      await page.evaluate(SCROLL_TO_BOTTOM);
      break;
  }
}

// ── Trace lines ──────────────────────────────────────────────

export function describeAction(action: Action): string {
  switch (action.type) {
    case 'click':
      return `Clicked: ${action.selector}`;
    case 'type':
      return `Typed '${action.text}' in: ${action.selector}`;
    case 'wait':
      return `Waited: ${String(action.timeout)}ms`;
    case 'wait_for_selector':
      return `Waited for selector: ${action.selector}`;
    case 'scroll':
      return 'Scrolled to bottom';
  }
}
