/**
 * Default configuration values.
 * Timeouts are fixed by the worker contract; server values are
 * overridable via env or config file.
 */

export const TIMEOUTS = {
  NAVIGATION_TIMEOUT: 30_000,
  READINESS_TIMEOUT: 30_000,
  SELECTOR_TIMEOUT: 10_000,
  ACTION_TIMEOUT: 30_000,
  DEFAULT_WAIT: 1_000,
  TASK_TIMEOUT: 120_000,
} as const;

export const LIMITS = {
  MAX_BODY_BYTES: 1_048_576,
} as const;

/** Chromium flags for running inside a container without a GPU. */
export const LAUNCH_ARGS: readonly string[] = [
  '--no-sandbox',
  '--disable-setuid-sandbox',
  '--disable-dev-shm-usage',
  '--disable-gpu',
  '--safebrowsing-disable-auto-update',
  '--disable-extensions',
  '--disable-sync',
  '--disable-web-security',
  '--disable-features=VizDisplayCompositor',
];

export const REQUEST_DEFAULTS = {
  FULL_PAGE: true,
  WIDTH: 1920,
  HEIGHT: 1080,
  WAIT_FOR: 'networkidle',
  SCREENSHOT_AFTER: true,
} as const;

export const SERVER_DEFAULTS = {
  HOST: '0.0.0.0',
  PORT: 8000,
  STORAGE_PATH: 'browser-storage.json',
  LOG_LEVEL: 'info',
} as const;
