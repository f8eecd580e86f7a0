/**
 * HTTP transport.
 * Routing, credential checks and envelopes around the worker.
 * No browser logic lives here.
 */

export { createWorkerServer } from './http.js';
export type { WorkerServer, WorkerServerOptions } from './http.js';
export { authenticate, extractCredential, secretsMatch, AUTH_MESSAGES } from './auth.js';
export type { AuthResult } from './auth.js';
export { HttpError } from './errors.js';
export { createRoutes } from './routes.js';
export type { Route, RouteContext, RouteDeps, Reply } from './routes.js';
