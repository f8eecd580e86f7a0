/**
 * Core module.
 * Task orchestration, the error taxonomy and the Result type.
 */

export { BrowserWorker } from './worker.js';
export type {
  ActionOutcome,
  ActionTask,
  ActionTaskFailure,
  ContentTask,
  ScreenshotTask,
  TaskOptions,
  WorkerOptions,
  WorkerStatus,
} from './worker.js';
export * from './errors.js';
export { ok, err, toMessage } from './result.js';
export type { Ok, Err, Result } from './result.js';
export { cancellationOf, raceSignal } from './abort.js';
