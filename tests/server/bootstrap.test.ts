import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync, mkdtempSync, readFileSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import type { WorkerConfig } from '../../src/config/loader.js';
import { startWorker } from '../../src/server/bootstrap.js';
import { FakeEngine } from '../helpers/fakeEngine.js';

const PAGE = 'https://example.test/';

function configFor(storagePath: string, overrides: Partial<WorkerConfig> = {}): WorkerConfig {
  return {
    secretKey: 'test-secret',
    secretGenerated: false,
    host: '127.0.0.1',
    port: 0,
    storagePath,
    headless: true,
    logLevel: 'error',
    taskTimeoutMs: 5_000,
    saveStorageOnShutdown: true,
    ...overrides,
  };
}

describe('startWorker', () => {
  let dir: string;
  let engine: FakeEngine;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'browser-worker-boot-'));
    engine = new FakeEngine().site(PAGE, { title: 'Example' });
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('listens on an ephemeral port without launching the browser', async () => {
    const running = await startWorker(configFor(join(dir, 'state.json')), engine);

    expect(running.address.port).toBeGreaterThan(0);
    expect(running.worker.status().initialized).toBe(false);
    expect(engine.launches).toHaveLength(0);

    await running.shutdown();
  });

  it('saves storage and closes the browser on shutdown', async () => {
    const storagePath = join(dir, 'state.json');
    const running = await startWorker(configFor(storagePath), engine);

    await running.worker.getContent({ url: PAGE, waitFor: 'load' });
    engine.lastContext?.cookies.set('sid', 'abc');

    await running.shutdown();
    await running.shutdown();

    expect(JSON.parse(readFileSync(storagePath, 'utf-8'))).toEqual({
      cookies: [{ name: 'sid', value: 'abc' }],
      origins: [],
    });
    expect(engine.browsers[0]?.closed).toBe(true);
    expect(running.worker.status().initialized).toBe(false);
  });

  it('leaves storage alone when saving on shutdown is disabled', async () => {
    const storagePath = join(dir, 'state.json');
    const running = await startWorker(configFor(storagePath, { saveStorageOnShutdown: false }), engine);

    await running.worker.getContent({ url: PAGE, waitFor: 'load' });
    await running.shutdown();

    expect(existsSync(storagePath)).toBe(false);
  });
});
