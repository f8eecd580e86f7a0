import { chromium } from 'playwright';
import type { Browser, BrowserContext, BrowserType, Page } from 'playwright';

import type { WaitPolicy } from '../schema/request.js';

// ── Automation surface ───────────────────────────────────────
// The narrow slice of a browser the worker drives. Playwright is the
// production implementation; tests plug in an in-process fake.

export interface Viewport {
  width: number;
  height: number;
}

export interface EngineElement {
  innerHTML(): Promise<string>;
}

export interface EnginePage {
  setViewportSize(viewport: Viewport): Promise<void>;
  goto(url: string, timeoutMs: number): Promise<void>;
  waitForLoadState(state: WaitPolicy, timeoutMs: number): Promise<void>;
  title(): Promise<string>;
  content(): Promise<string>;
  $(selector: string): Promise<EngineElement | null>;
  click(selector: string, timeoutMs: number): Promise<void>;
  fill(selector: string, text: string, timeoutMs: number): Promise<void>;
  waitForTimeout(ms: number): Promise<void>;
  waitForSelector(selector: string, timeoutMs: number): Promise<void>;
  evaluate(expression: string): Promise<unknown>;
  screenshot(fullPage: boolean): Promise<Buffer>;
  close(): Promise<void>;
}

export interface EngineContext {
  newPage(): Promise<EnginePage>;
  /** Write cookies + local storage to `path` as JSON. */
  saveStorageState(path: string): Promise<void>;
  close(): Promise<void>;
}

export interface NewContextOptions {
  /** Restore cookies + local storage from a file written by `saveStorageState`. */
  storageStatePath?: string;
}

export interface EngineBrowser {
  newContext(options: NewContextOptions): Promise<EngineContext>;
  close(): Promise<void>;
}

export interface LaunchOptions {
  headless: boolean;
  args: readonly string[];
}

export interface BrowserEngine {
  readonly name: string;
  launch(options: LaunchOptions): Promise<EngineBrowser>;
}

// ── Playwright adapter ───────────────────────────────────────

export function createPlaywrightEngine(
  browserType: BrowserType = chromium,
): BrowserEngine {
  return {
    name: browserType.name(),

    async launch(options: LaunchOptions): Promise<EngineBrowser> {
      const browser = await browserType.launch({
        headless: options.headless,
        args: [...options.args],
      });
      return wrapBrowser(browser);
    },
  };
}

function wrapBrowser(browser: Browser): EngineBrowser {
  return {
    async newContext(options: NewContextOptions): Promise<EngineContext> {
      const context = await browser.newContext(
        options.storageStatePath !== undefined
          ? { storageState: options.storageStatePath }
          : {},
      );
      return wrapContext(context);
    },

    async close(): Promise<void> {
      await browser.close();
    },
  };
}

function wrapContext(context: BrowserContext): EngineContext {
  return {
    async newPage(): Promise<EnginePage> {
      return wrapPage(await context.newPage());
    },

    async saveStorageState(path: string): Promise<void> {
      await context.storageState({ path });
    },

    async close(): Promise<void> {
      await context.close();
    },
  };
}

function wrapPage(page: Page): EnginePage {
  return {
    setViewportSize: (viewport) => page.setViewportSize(viewport),

    async goto(url, timeoutMs) {
      await page.goto(url, { timeout: timeoutMs });
    },

    waitForLoadState: (state, timeoutMs) =>
      page.waitForLoadState(state, { timeout: timeoutMs }),

    title: () => page.title(),
    content: () => page.content(),

    async $(selector) {
      const element = await page.$(selector);
      if (!element) return null;
      return { innerHTML: () => element.innerHTML() };
    },

    click: (selector, timeoutMs) => page.click(selector, { timeout: timeoutMs }),

    fill: (selector, text, timeoutMs) =>
      page.fill(selector, text, { timeout: timeoutMs }),

    waitForTimeout: (ms) => page.waitForTimeout(ms),

    async waitForSelector(selector, timeoutMs) {
      await page.waitForSelector(selector, { timeout: timeoutMs });
    },

    evaluate: (expression) => page.evaluate(expression),

    screenshot: (fullPage) => page.screenshot({ fullPage, type: 'png' }),

    close: () => page.close(),
  };
}
