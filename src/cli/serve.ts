import type { Command } from 'commander';

import { createPlaywrightEngine } from '../browser/engine.js';
import { loadConfig } from '../config/loader.js';
import { toMessage } from '../core/result.js';
import type { ServerConfigInput } from '../schema/config.js';
import { logLevelSchema } from '../schema/config.js';
import { startWorker } from '../server/bootstrap.js';
import * as log from '../utils/logger.js';

// ── Option parsing ───────────────────────────────────────────

interface ServeOptions {
  host?: string;
  port?: string;
  config?: string;
  storage?: string;
  headed?: true;
  logLevel?: string;
}

export function overridesFromOptions(opts: ServeOptions): ServerConfigInput {
  const overrides: ServerConfigInput = {};

  if (opts.host !== undefined) overrides.host = opts.host;
  if (opts.port !== undefined) {
    const port = Number(opts.port);
    if (!Number.isInteger(port)) {
      throw new Error(`--port must be an integer, got "${opts.port}"`);
    }
    overrides.port = port;
  }
  if (opts.storage !== undefined) overrides.storagePath = opts.storage;
  if (opts.headed) overrides.headless = false;
  if (opts.logLevel !== undefined) overrides.logLevel = logLevelSchema.parse(opts.logLevel);

  return overrides;
}

// ── Command registration ─────────────────────────────────────

export function registerServeCommand(program: Command): void {
  program
    .command('serve')
    .description('Start the authenticated HTTP worker')
    .option('--host <host>', 'Interface to bind')
    .option('--port <port>', 'Port to listen on')
    .option('--config <path>', 'YAML or JSON config file')
    .option('--storage <path>', 'Storage state file to restore from and save to')
    .option('--headed', 'Run the browser with a visible window')
    .option('--log-level <level>', 'debug | info | warn | error')
    .action(async (opts: ServeOptions) => {
      try {
        const config = await loadConfig({
          file: opts.config,
          overrides: overridesFromOptions(opts),
        });
        log.setLogLevel(config.logLevel);

        const running = await startWorker(config, createPlaywrightEngine());

        const onSignal = (signal: NodeJS.Signals): void => {
          log.info(`Received ${signal}, shutting down`);
          running.shutdown().then(
            () => {
              process.exitCode = 0;
            },
            (cause: unknown) => {
              log.error(`Shutdown failed: ${toMessage(cause)}`);
              process.exitCode = 1;
            },
          );
        };
        process.once('SIGINT', onSignal);
        process.once('SIGTERM', onSignal);
      } catch (err) {
        log.error(`Startup failed: ${toMessage(err)}`);
        process.exitCode = 4;
      }
    });
}
