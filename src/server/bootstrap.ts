import type { AddressInfo } from 'node:net';

import type { BrowserEngine } from '../browser/engine.js';
import { TaskSerializer } from '../browser/serializer.js';
import { SessionManager } from '../browser/session.js';
import type { WorkerConfig } from '../config/loader.js';
import { BrowserWorker } from '../core/worker.js';
import * as log from '../utils/logger.js';
import { createWorkerServer } from './http.js';
import type { WorkerServer } from './http.js';

// ── Public types ─────────────────────────────────────────────

export interface RunningWorker {
  readonly worker: BrowserWorker;
  readonly server: WorkerServer;
  readonly address: AddressInfo;
  /** Stop the server, persist storage if configured, close the browser. */
  shutdown(): Promise<void>;
}

// ── Startup ──────────────────────────────────────────────────

/**
 * Wire session → worker → HTTP server from a resolved config and start
 * listening. The browser itself is launched lazily by the first task.
 */
export async function startWorker(
  config: WorkerConfig,
  engine: BrowserEngine,
): Promise<RunningWorker> {
  if (config.secretGenerated) {
    log.warn('SECRET_KEY not set; generated a temporary key. Requests will be rejected until a key is configured.');
  }

  const session = new SessionManager(engine, {
    headless: config.headless,
    storagePath: config.storagePath,
  });
  const worker = new BrowserWorker(session, new TaskSerializer(), {
    taskTimeoutMs: config.taskTimeoutMs,
  });
  const server = createWorkerServer({
    worker,
    secretKey: config.secretKey,
    host: config.host,
    port: config.port,
  });

  const address = await server.listen();
  log.info(`Browser worker listening on http://${address.address}:${String(address.port)}`);

  let stopping: Promise<void> | null = null;

  return {
    worker,
    server,
    address,
    shutdown(): Promise<void> {
      stopping ??= (async () => {
        await server.stop();

        if (config.saveStorageOnShutdown) {
          const saved = await worker.saveStorage();
          if (!saved.ok) log.warn(saved.error.message);
        }

        await worker.close();
        log.info('Browser worker stopped');
      })();
      return stopping;
    },
  };
}
