#!/usr/bin/env node

/**
 * browser-worker CLI entry point.
 * Thin wrapper — all logic delegated to the server and core modules.
 */

import 'dotenv/config';
import { Command } from 'commander';

import { registerServeCommand } from './serve.js';

const program = new Command();

program
  .name('browser-worker')
  .description(
    'Remote browser automation over an authenticated HTTP API: screenshots, content extraction and scripted UI actions, driven by Playwright.',
  )
  .version('0.1.0');

registerServeCommand(program);

await program.parseAsync();
