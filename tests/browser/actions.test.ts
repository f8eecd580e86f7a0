import { describe, it, expect, beforeEach } from 'vitest';

import { describeAction, runActions } from '../../src/browser/actions.js';
import { ActionExecutionError, TaskCancelledError } from '../../src/core/errors.js';
import { FakeContext, FakeEngine } from '../helpers/fakeEngine.js';
import type { FakePage } from '../helpers/fakeEngine.js';

const URL = 'https://example.test/form';

describe('runActions', () => {
  let engine: FakeEngine;
  let page: FakePage;

  beforeEach(async () => {
    engine = new FakeEngine().site(URL, {
      elements: { '#a': 'A', '#name': '', '#results': '<li>1</li>' },
    });
    await new FakeContext(engine).newPage();
    const created = engine.pages[0];
    if (!created) throw new Error('page was not created');
    page = created;
    await page.goto(URL, 30_000);
    page.calls.length = 0;
  });

  it('runs every action in order and records the trace', async () => {
    const run = await runActions(page, [
      { type: 'click', selector: '#a' },
      { type: 'type', selector: '#name', text: 'Ada' },
      { type: 'wait', timeout: 5 },
      { type: 'wait_for_selector', selector: '#results' },
      { type: 'scroll' },
    ]);

    expect(run.failure).toBeNull();
    expect(run.trace).toEqual([
      'Clicked: #a',
      "Typed 'Ada' in: #name",
      'Waited: 5ms',
      'Waited for selector: #results',
      'Scrolled to bottom',
    ]);
    expect(page.calls).toEqual([
      'click #a',
      'fill #name Ada',
      'waitForTimeout 5',
      'waitForSelector #results 10000',
      'evaluate window.scrollTo(0, document.body.scrollHeight)',
    ]);
  });

  it('defaults wait to 1000ms', async () => {
    engine.instantWaits = true;
    const run = await runActions(page, [{ type: 'wait' }]);

    expect(run.trace).toEqual(['Waited: 1000ms']);
    expect(page.calls).toEqual(['waitForTimeout 1000']);
  });

  it('stops at a type action with a missing field and keeps the earlier trace', async () => {
    const run = await runActions(page, [
      { type: 'click', selector: '#a' },
      { type: 'type', selector: '#bad' },
      { type: 'click', selector: '#a' },
    ]);

    expect(run.trace).toEqual(['Clicked: #a']);
    expect(run.failure).toBeInstanceOf(ActionExecutionError);
    expect(run.failure).toMatchObject({ index: 1, actionType: 'type' });
    expect(run.failure?.message).toBe('Action 1 (type) failed: missing required field "text"');
    expect(page.calls).toEqual(['click #a']);
  });

  it('stops when a selector resolves to nothing', async () => {
    const run = await runActions(page, [
      { type: 'click', selector: '#a' },
      { type: 'type', selector: '#bad', text: 'x' },
    ]);

    expect(run.trace).toEqual(['Clicked: #a']);
    expect(run.failure).toMatchObject({ kind: 'action', index: 1, actionType: 'type' });
    expect(run.failure?.message).toBe(
      "Action 1 (type) failed: Timeout 30000ms exceeded waiting for locator('#bad')",
    );
  });

  it('fails wait_for_selector after its bound when nothing appears', async () => {
    const run = await runActions(page, [{ type: 'wait_for_selector', selector: '#never' }]);

    expect(run.trace).toEqual([]);
    expect(run.failure?.message).toBe(
      "Action 0 (wait_for_selector) failed: Timeout 10000ms exceeded waiting for locator('#never')",
    );
  });

  it('skips actions of unknown type', async () => {
    const run = await runActions(page, [
      { type: 'hover', selector: '#a' },
      { type: 'click', selector: '#a' },
    ]);

    expect(run.failure).toBeNull();
    expect(run.trace).toEqual(['Clicked: #a']);
  });

  it('rejects entries that are not objects or lack a type', async () => {
    const notObject = await runActions(page, ['click']);
    expect(notObject.failure?.message).toBe('Action 0 (unknown) failed: action must be an object');

    const noType = await runActions(page, [{ selector: '#a' }]);
    expect(noType.failure?.message).toBe('Action 0 (unknown) failed: missing required field "type"');
  });

  it('returns an empty trace for an empty sequence', async () => {
    const run = await runActions(page, []);

    expect(run).toEqual({ trace: [], failure: null });
  });

  it('stops before the next action once the signal aborts', async () => {
    const controller = new AbortController();
    const run = runActions(
      page,
      [
        { type: 'wait', timeout: 30 },
        { type: 'click', selector: '#a' },
      ],
      controller.signal,
    );
    setTimeout(() => controller.abort(), 5);

    const result = await run;
    expect(result.trace).toEqual([]);
    expect(result.failure).toBeInstanceOf(TaskCancelledError);
    expect(page.calls).toEqual(['waitForTimeout 30']);
  });
});

describe('describeAction', () => {
  it('formats each action type', () => {
    expect(describeAction({ type: 'click', selector: 'button.go' })).toBe('Clicked: button.go');
    expect(describeAction({ type: 'type', selector: '#q', text: 'hi' })).toBe("Typed 'hi' in: #q");
    expect(describeAction({ type: 'wait', timeout: 250 })).toBe('Waited: 250ms');
    expect(describeAction({ type: 'wait_for_selector', selector: '.done' })).toBe('Waited for selector: .done');
    expect(describeAction({ type: 'scroll' })).toBe('Scrolled to bottom');
  });
});
