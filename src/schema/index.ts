/**
 * Schema module — single source of truth for all data shapes.
 * Zod schemas + inferred TypeScript types.
 * Every boundary validates through these schemas.
 */

export * from './action.js';
export * from './request.js';
export * from './response.js';
export * from './config.js';
