/**
 * Configuration module.
 * Loads and validates runtime config from env, CLI flags, and config files.
 * Zod-validated.
 */

export { TIMEOUTS, LIMITS, LAUNCH_ARGS, REQUEST_DEFAULTS, SERVER_DEFAULTS } from './defaults.js';
export { loadConfig, loadConfigFile, configFromEnv, generateSecret } from './loader.js';
export type { WorkerConfig, LoadConfigOptions } from './loader.js';
