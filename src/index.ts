/**
 * browser-worker public API.
 * Embed the worker in another process, or run `browser-worker serve`.
 */

export * from './browser/index.js';
export * from './core/index.js';
export * from './server/index.js';
export * from './schema/index.js';
export { startWorker } from './server/bootstrap.js';
export type { RunningWorker } from './server/bootstrap.js';
export { loadConfig, TIMEOUTS, LIMITS, LAUNCH_ARGS } from './config/index.js';
export type { WorkerConfig, LoadConfigOptions } from './config/index.js';
