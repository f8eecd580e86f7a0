import { z } from 'zod';

import { SERVER_DEFAULTS, TIMEOUTS } from '../config/defaults.js';

// ── Log level ────────────────────────────────────────────────

export const logLevelSchema = z.enum(['debug', 'info', 'warn', 'error']);

export type LogLevel = z.infer<typeof logLevelSchema>;

// ── Server config ────────────────────────────────────────────

export const serverConfigSchema = z
  .object({
    secretKey: z.string().min(1).optional(),
    host: z.string().min(1).default(SERVER_DEFAULTS.HOST),
    port: z.number().int().min(0).max(65_535).default(SERVER_DEFAULTS.PORT),
    storagePath: z.string().min(1).default(SERVER_DEFAULTS.STORAGE_PATH),
    headless: z.boolean().default(true),
    logLevel: logLevelSchema.default(SERVER_DEFAULTS.LOG_LEVEL),
    taskTimeoutMs: z.number().int().positive().default(TIMEOUTS.TASK_TIMEOUT),
    saveStorageOnShutdown: z.boolean().default(true),
  })
  .strict();

export type ServerConfigInput = z.input<typeof serverConfigSchema>;
export type ServerConfig = z.infer<typeof serverConfigSchema>;
