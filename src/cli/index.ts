/**
 * CLI module — thin wrapper over the server.
 * Parses arguments, resolves config, handles exit codes.
 * No business logic lives here.
 */

export { registerServeCommand, overridesFromOptions } from './serve.js';
