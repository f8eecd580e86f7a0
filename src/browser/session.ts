import { access } from 'node:fs/promises';

import { LAUNCH_ARGS } from '../config/defaults.js';
import { EngineInitError, EngineLoadError } from '../core/errors.js';
import { err, ok, toMessage } from '../core/result.js';
import type { Result } from '../core/result.js';
import * as log from '../utils/logger.js';
import type { BrowserEngine, EngineBrowser, EngineContext } from './engine.js';

// ── Public types ─────────────────────────────────────────────

export interface SessionOptions {
  headless: boolean;
  /** Where the context's cookies/local storage are restored from and saved to. */
  storagePath?: string | undefined;
}

export interface EngineSession {
  readonly browser: EngineBrowser;
  readonly context: EngineContext;
  /** True when the context was restored from `storagePath`. */
  readonly restored: boolean;
}

export type SessionInitError = EngineInitError | EngineLoadError;

// ── Session manager ──────────────────────────────────────────

/**
 * Owns the one browser and its persisted context for the lifetime of
 * the process. Constructed once at startup and handed to the worker.
 */
export class SessionManager {
  private readonly engine: BrowserEngine;
  private readonly options: SessionOptions;

  private session: EngineSession | null = null;
  private pending: Promise<Result<EngineSession, SessionInitError>> | null = null;

  constructor(engine: BrowserEngine, options: SessionOptions) {
    this.engine = engine;
    this.options = options;
  }

  get initialized(): boolean {
    return this.session !== null;
  }

  get storagePath(): string | undefined {
    return this.options.storagePath;
  }

  /**
   * Launch the browser on first use. Concurrent callers share the same
   * launch; a failed launch leaves the manager uninitialized so the next
   * call tries again.
   */
  ensureInitialized(): Promise<Result<EngineSession, SessionInitError>> {
    if (this.session) return Promise.resolve(ok(this.session));
    if (this.pending) return this.pending;

    const launching = this.launch().finally(() => {
      this.pending = null;
    });
    this.pending = launching;
    return launching;
  }

  /**
   * Persist the context's storage state. Resolves `false` when there is
   * nothing to save (no context yet, or no storage path configured).
   */
  async saveStorage(): Promise<boolean> {
    const { storagePath } = this.options;
    if (!this.session || storagePath === undefined) return false;

    await this.session.context.saveStorageState(storagePath);
    log.session(`Storage state saved to ${storagePath}`);
    return true;
  }

  /** Tear down context then browser. Safe to call repeatedly. */
  async close(): Promise<void> {
    const current = this.session;
    this.session = null;
    if (!current) return;

    await closeQuietly('context', () => current.context.close());
    await closeQuietly('browser', () => current.browser.close());
    log.session('Browser closed');
  }

  // ── Internals ──────────────────────────────────────────────

  private async launch(): Promise<Result<EngineSession, SessionInitError>> {
    let browser: EngineBrowser;
    try {
      browser = await this.engine.launch({
        headless: this.options.headless,
        args: LAUNCH_ARGS,
      });
    } catch (cause) {
      log.error(`Failed to launch ${this.engine.name}: ${toMessage(cause)}`);
      return err(new EngineInitError(toMessage(cause), { cause }));
    }

    const storagePath = await this.existingStoragePath();

    try {
      const context = storagePath !== undefined
        ? await browser.newContext({ storageStatePath: storagePath })
        : await browser.newContext({});

      if (storagePath !== undefined) {
        log.session(`Loaded session from ${storagePath}`);
      } else {
        log.session('Created new browser context without session');
      }

      const session: EngineSession = { browser, context, restored: storagePath !== undefined };
      this.session = session;
      log.session(`${this.engine.name} initialized`);
      return ok(session);
    } catch (cause) {
      await closeQuietly('browser', () => browser.close());
      log.error(`Failed to create browser context: ${toMessage(cause)}`);
      return err(
        storagePath !== undefined
          ? new EngineLoadError(storagePath, toMessage(cause), { cause })
          : new EngineInitError(toMessage(cause), { cause }),
      );
    }
  }

  private async existingStoragePath(): Promise<string | undefined> {
    const { storagePath } = this.options;
    if (storagePath === undefined) return undefined;

    try {
      await access(storagePath);
      return storagePath;
    } catch {
      log.debug(`No storage state at ${storagePath}`);
      return undefined;
    }
  }
}

async function closeQuietly(what: string, close: () => Promise<void>): Promise<void> {
  try {
    await close();
  } catch (cause) {
    log.warn(`Closing ${what} failed: ${toMessage(cause)}`);
  }
}
