import { describe, it, expect, beforeEach } from 'vitest';

import { extractContent, missingSelectorMessage } from '../../src/browser/content.js';
import { captureScreenshot } from '../../src/browser/screenshot.js';
import { CaptureError, ExtractionError, TaskCancelledError } from '../../src/core/errors.js';
import { FakeContext, FakeEngine, PNG_SIGNATURE } from '../helpers/fakeEngine.js';
import type { FakePage } from '../helpers/fakeEngine.js';

const URL = 'https://example.test/article';
const DOCUMENT = '<html><head><title>Article</title></head><body><main><p>Hi</p></main></body></html>';

async function pageFor(engine: FakeEngine): Promise<FakePage> {
  await new FakeContext(engine).newPage();
  const page = engine.pages[0];
  if (!page) throw new Error('page was not created');
  await page.goto(URL, 30_000);
  return page;
}

describe('extractContent', () => {
  let engine: FakeEngine;

  beforeEach(() => {
    engine = new FakeEngine().site(URL, {
      title: 'Article',
      render: () => DOCUMENT,
      elements: { main: '<p>Hi</p>' },
    });
  });

  it('returns the title and the whole document without a selector', async () => {
    const result = await extractContent(await pageFor(engine));

    expect(result).toEqual({ ok: true, value: { title: 'Article', content: DOCUMENT } });
  });

  it('returns the inner HTML of the matched element', async () => {
    const result = await extractContent(await pageFor(engine), 'main');

    expect(result).toEqual({ ok: true, value: { title: 'Article', content: '<p>Hi</p>' } });
  });

  it('returns a sentinel naming the selector when nothing matches', async () => {
    const result = await extractContent(await pageFor(engine), '#sidebar');

    expect(result).toEqual({
      ok: true,
      value: { title: 'Article', content: "Element with selector '#sidebar' not found" },
    });
    expect(missingSelectorMessage('#sidebar')).toContain('#sidebar');
  });

  it('treats an empty selector as no selector', async () => {
    const result = await extractContent(await pageFor(engine), '');

    expect(result.ok && result.value.content).toBe(DOCUMENT);
  });

  it('wraps engine failures in an ExtractionError', async () => {
    engine.site(URL, { titleError: 'Target crashed' });

    const result = await extractContent(await pageFor(engine));

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(ExtractionError);
      expect(result.error.message).toBe('Content extraction failed: Target crashed');
    }
  });

  it('stops reading when the task is cancelled', async () => {
    const page = await pageFor(engine);
    const controller = new AbortController();
    controller.abort(new TaskCancelledError('deadline'));

    const result = await extractContent(page, undefined, controller.signal);

    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error).toMatchObject({ kind: 'cancelled', reason: 'deadline' });
  });
});

describe('captureScreenshot', () => {
  it('returns PNG bytes for a full-page capture', async () => {
    const engine = new FakeEngine().site(URL, {});
    const page = await pageFor(engine);
    await page.setViewportSize({ width: 800, height: 600 });

    const result = await captureScreenshot(page, true);

    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.value.subarray(0, 8).equals(PNG_SIGNATURE)).toBe(true);
      expect(result.value.subarray(8).toString()).toBe('true:800x600');
    }
    expect(page.calls.at(-1)).toBe('screenshot fullPage=true');
  });

  it('captures only the viewport when fullPage is false', async () => {
    const engine = new FakeEngine().site(URL, {});
    const page = await pageFor(engine);

    await captureScreenshot(page, false);

    expect(page.calls.at(-1)).toBe('screenshot fullPage=false');
  });

  it('wraps engine failures in a CaptureError', async () => {
    const engine = new FakeEngine().site(URL, { screenshotError: 'Page crashed' });

    const result = await captureScreenshot(await pageFor(engine), true);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(CaptureError);
      expect(result.error.message).toBe('Screenshot failed: Page crashed');
    }
  });

  it('gives up on a capture when the task is cancelled', async () => {
    const engine = new FakeEngine().site(URL, { screenshotDelayMs: 200 });
    const page = await pageFor(engine);
    const controller = new AbortController();
    setTimeout(() => controller.abort(), 10);

    const result = await captureScreenshot(page, true, controller.signal);

    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error).toMatchObject({ kind: 'cancelled', reason: 'aborted' });
  });
});
