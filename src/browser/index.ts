/**
 * Browser execution module.
 * Session lifecycle, the single-flight lane, per-task pages, and the
 * operations that run against a page. No HTTP concerns here.
 */

export { createPlaywrightEngine } from './engine.js';
export type {
  BrowserEngine,
  EngineBrowser,
  EngineContext,
  EngineElement,
  EnginePage,
  LaunchOptions,
  NewContextOptions,
  Viewport,
} from './engine.js';
export { SessionManager } from './session.js';
export type { EngineSession, SessionOptions, SessionInitError } from './session.js';
export { TaskSerializer } from './serializer.js';
export type { TaskPermit } from './serializer.js';
export { openPage, withPage } from './page.js';
export type { OpenPageOptions, OpenPageError, PageHandle } from './page.js';
export { runActions, describeAction } from './actions.js';
export type { ActionRun, ActionFailure } from './actions.js';
export { extractContent, missingSelectorMessage } from './content.js';
export type { PageContent } from './content.js';
export { captureScreenshot } from './screenshot.js';
