import { createServer } from 'node:http';
import type { IncomingMessage, Server, ServerResponse } from 'node:http';
import type { AddressInfo } from 'node:net';

import { LIMITS } from '../config/defaults.js';
import { toMessage } from '../core/result.js';
import type { BrowserWorker } from '../core/worker.js';
import type { ErrorResponse } from '../schema/response.js';
import * as log from '../utils/logger.js';
import { authenticate } from './auth.js';
import { HttpError } from './errors.js';
import { createRoutes } from './routes.js';
import type { Reply, Route } from './routes.js';

// ── Public types ─────────────────────────────────────────────

export interface WorkerServerOptions {
  worker: BrowserWorker;
  secretKey: string;
  host?: string;
  port?: number;
  maxBodyBytes?: number;
  now?: () => Date;
}

export interface WorkerServer {
  readonly server: Server;
  /** Start listening; resolves with the bound address. */
  listen(): Promise<AddressInfo>;
  /** Stop accepting connections and wait for open ones to finish. */
  stop(): Promise<void>;
}

// ── Body reading ─────────────────────────────────────────────

/**
 * Collect and parse a JSON body. An oversized body is drained rather
 * than cut off, so the 413 reply still reaches the client.
 */
function readJsonBody(req: IncomingMessage, limit: number): Promise<unknown> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    let size = 0;
    let tooLarge = false;

    req.on('data', (chunk: Buffer) => {
      size += chunk.length;
      if (size > limit) {
        tooLarge = true;
        chunks.length = 0;
      }
      if (!tooLarge) chunks.push(chunk);
    });

    req.on('error', reject);

    req.on('end', () => {
      if (tooLarge) {
        reject(new HttpError(413, `Request body exceeds ${String(limit)} bytes`));
        return;
      }

      const raw = Buffer.concat(chunks).toString('utf-8').trim();
      if (raw.length === 0) {
        reject(new HttpError(400, 'Request body must be a JSON object'));
        return;
      }

      try {
        const parsed: unknown = JSON.parse(raw);
        resolve(parsed);
      } catch (cause) {
        reject(new HttpError(400, `Malformed JSON body: ${toMessage(cause)}`));
      }
    });
  });
}

function send(res: ServerResponse, reply: Reply): void {
  const payload = JSON.stringify(reply.body);
  res.writeHead(reply.status, {
    'Content-Type': 'application/json; charset=utf-8',
    'Content-Length': Buffer.byteLength(payload),
  });
  res.end(payload);
}

function errorReply(status: number, detail: string, issues?: readonly string[]): Reply {
  const body: ErrorResponse = { detail };
  if (issues && issues.length > 0) body.issues = [...issues];
  return { status, body };
}

// ── Server ───────────────────────────────────────────────────

export function createWorkerServer(options: WorkerServerOptions): WorkerServer {
  const maxBodyBytes = options.maxBodyBytes ?? LIMITS.MAX_BODY_BYTES;
  const routes = createRoutes({
    worker: options.worker,
    now: options.now ?? (() => new Date()),
  });

  const routeTable = new Map<string, Route>(
    routes.map((route) => [`${route.method} ${route.path}`, route]),
  );

  async function dispatch(req: IncomingMessage, res: ServerResponse): Promise<Reply> {
    const method = req.method ?? 'GET';
    const path = new URL(req.url ?? '/', 'http://localhost').pathname;

    const route = routeTable.get(`${method} ${path}`);
    if (!route) {
      return errorReply(404, `No route for ${method} ${path}`);
    }

    if (route.auth) {
      const auth = authenticate(req.headers, options.secretKey);
      if (!auth.ok) return errorReply(401, auth.detail);
    }

    const controller = new AbortController();
    res.on('close', () => {
      if (!res.writableFinished) controller.abort();
    });

    try {
      return await route.handle({
        signal: controller.signal,
        body: () => readJsonBody(req, maxBodyBytes),
      });
    } catch (cause) {
      if (cause instanceof HttpError) {
        return errorReply(cause.status, cause.message, cause.issues);
      }
      log.error(`${method} ${path} failed: ${toMessage(cause)}`);
      return errorReply(500, 'Internal server error');
    }
  }

  const server = createServer((req, res) => {
    const started = Date.now();
    dispatch(req, res).then(
      (reply) => {
        if (!res.destroyed) send(res, reply);
        log.request(req.method ?? 'GET', req.url ?? '/', reply.status, Date.now() - started);
      },
      (cause: unknown) => {
        log.error(`Request handling crashed: ${toMessage(cause)}`);
        if (!res.destroyed) send(res, errorReply(500, 'Internal server error'));
      },
    );
  });

  return {
    server,

    listen(): Promise<AddressInfo> {
      return new Promise((resolve, reject) => {
        server.once('error', reject);
        server.listen(options.port ?? 0, options.host ?? '127.0.0.1', () => {
          server.off('error', reject);
          const address = server.address();
          if (address === null || typeof address === 'string') {
            reject(new Error('Server is not listening on a TCP port'));
            return;
          }
          resolve(address);
        });
      });
    },

    stop(): Promise<void> {
      return new Promise((resolve, reject) => {
        server.close((cause) => {
          if (cause) reject(cause);
          else resolve();
        });
        server.closeIdleConnections();
      });
    },
  };
}
