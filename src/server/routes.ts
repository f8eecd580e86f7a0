import type { ZodType, ZodTypeDef } from 'zod';

import { err, toMessage } from '../core/result.js';
import type { Result } from '../core/result.js';
import type { BrowserWorker } from '../core/worker.js';
import {
  actionRequestSchema,
  contentRequestSchema,
  screenshotRequestSchema,
} from '../schema/request.js';
import type {
  ActionResponse,
  ContentResponse,
  HealthResponse,
  RootResponse,
  SaveSessionResponse,
  ScreenshotResponse,
} from '../schema/response.js';
import * as log from '../utils/logger.js';
import { validationError } from './errors.js';

// ── Public types ─────────────────────────────────────────────

export interface RouteContext {
  /** Aborts when the client goes away before the reply is written. */
  readonly signal: AbortSignal;
  /** Read and JSON-parse the request body. */
  body(): Promise<unknown>;
}

export interface Reply {
  status: number;
  body: unknown;
}

export interface RouteDeps {
  worker: BrowserWorker;
  now: () => Date;
}

export interface Route {
  method: 'GET' | 'POST';
  path: string;
  auth: boolean;
  handle(ctx: RouteContext): Promise<Reply>;
}

// ── Helpers ──────────────────────────────────────────────────

function parseWith<Out, In>(schema: ZodType<Out, ZodTypeDef, In>, data: unknown): Out {
  const parsed = schema.safeParse(data);
  if (!parsed.success) throw validationError(parsed.error);
  return parsed.data;
}

/** Turn anything the worker throws into a failed result. */
async function attempt<T, E>(
  work: () => Promise<Result<T, E>>,
): Promise<Result<T, E | Error>> {
  try {
    return await work();
  } catch (cause) {
    log.error(`Unexpected task failure: ${toMessage(cause)}`);
    return err(cause instanceof Error ? cause : new Error(toMessage(cause)));
  }
}

function json(body: unknown, status = 200): Reply {
  return { status, body };
}

// ── Routes ───────────────────────────────────────────────────

export function createRoutes(deps: RouteDeps): Route[] {
  const { worker } = deps;
  const timestamp = (): string => deps.now().toISOString();

  return [
    {
      method: 'GET',
      path: '/',
      auth: false,
      async handle(): Promise<Reply> {
        const body: RootResponse = {
          message: 'Browser worker API is running',
          status: 'healthy',
          timestamp: timestamp(),
          auth_required: true,
        };
        return json(body);
      },
    },

    {
      method: 'GET',
      path: '/health',
      auth: true,
      async handle(): Promise<Reply> {
        const status = worker.status();
        const body: HealthResponse = {
          status: 'healthy',
          playwright_initialized: status.initialized,
          timestamp: timestamp(),
          authenticated: true,
          queue: { busy: status.busy, pending: status.pending },
        };
        return json(body);
      },
    },

    {
      method: 'POST',
      path: '/screenshot',
      auth: true,
      async handle(ctx): Promise<Reply> {
        const request = parseWith(screenshotRequestSchema, await ctx.body());

        const result = await attempt(() =>
          worker.takeScreenshot(
            {
              url: request.url,
              fullPage: request.full_page,
              viewport: { width: request.width, height: request.height },
              waitFor: request.wait_for,
            },
            { signal: ctx.signal },
          ),
        );

        const body: ScreenshotResponse = result.ok
          ? {
              success: true,
              image_base64: result.value.toString('base64'),
              timestamp: timestamp(),
              url: request.url,
            }
          : {
              success: false,
              error: result.error.message,
              timestamp: timestamp(),
              url: request.url,
            };
        return json(body);
      },
    },

    {
      method: 'POST',
      path: '/content',
      auth: true,
      async handle(ctx): Promise<Reply> {
        const request = parseWith(contentRequestSchema, await ctx.body());

        const result = await attempt(() =>
          worker.getContent(
            {
              url: request.url,
              waitFor: request.wait_for,
              selector: request.selector ?? undefined,
            },
            { signal: ctx.signal },
          ),
        );

        const body: ContentResponse = result.ok
          ? {
              success: true,
              content: result.value.content,
              title: result.value.title,
              timestamp: timestamp(),
              url: request.url,
            }
          : {
              success: false,
              error: result.error.message,
              timestamp: timestamp(),
              url: request.url,
            };
        return json(body);
      },
    },

    {
      method: 'POST',
      path: '/actions',
      auth: true,
      async handle(ctx): Promise<Reply> {
        const request = parseWith(actionRequestSchema, await ctx.body());

        let body: ActionResponse;
        try {
          const result = await worker.performActions(
            {
              url: request.url,
              actions: request.actions,
              screenshotAfter: request.screenshot_after,
            },
            { signal: ctx.signal },
          );

          if (result.ok) {
            body = {
              success: true,
              result: { actions_performed: [...result.value.trace] },
              timestamp: timestamp(),
              url: request.url,
            };
            if (result.value.screenshot) {
              body.screenshot_base64 = result.value.screenshot.toString('base64');
            }
          } else {
            body = {
              success: false,
              result: { actions_performed: [...result.error.trace] },
              error: result.error.error.message,
              timestamp: timestamp(),
              url: request.url,
            };
          }
        } catch (cause) {
          log.error(`Unexpected task failure: ${toMessage(cause)}`);
          body = {
            success: false,
            error: toMessage(cause),
            timestamp: timestamp(),
            url: request.url,
          };
        }
        return json(body);
      },
    },

    {
      method: 'POST',
      path: '/session/save',
      auth: true,
      async handle(ctx): Promise<Reply> {
        const result = await attempt(() => worker.saveStorage({ signal: ctx.signal }));
        const storagePath = worker.session.storagePath;

        const body: SaveSessionResponse = result.ok
          ? { success: true, saved: result.value, timestamp: timestamp() }
          : { success: false, saved: false, error: result.error.message, timestamp: timestamp() };
        if (result.ok && result.value && storagePath !== undefined) {
          body.storage_path = storagePath;
        }
        return json(body);
      },
    },
  ];
}
