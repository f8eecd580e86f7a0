/**
 * Live logger for the browser worker.
 *
 * All output goes to stderr, one line per event.
 * Emoji prefixes give instant visual context in the terminal.
 */

import type { LogLevel } from '../schema/config.js';

// ── Level filter ────────────────────────────────────────────

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

let threshold: LogLevel = 'info';

export function setLogLevel(level: LogLevel): void {
  threshold = level;
}

export function getLogLevel(): LogLevel {
  return threshold;
}

// ── Core write ──────────────────────────────────────────────

function write(level: LogLevel, message: string): void {
  if (LEVEL_RANK[level] < LEVEL_RANK[threshold]) return;
  process.stderr.write(message + '\n');
}

// ── Public API ──────────────────────────────────────────────

export function debug(message: string): void {
  write('debug', `🔎 ${message}`);
}

export function info(message: string): void {
  write('info', `ℹ️  ${message}`);
}

export function detail(message: string): void {
  write('info', `   ${message}`);
}

export function warn(message: string): void {
  write('warn', `⚠️  ${message}`);
}

export function error(message: string): void {
  write('error', `💥 ${message}`);
}

export function session(message: string): void {
  write('info', `🌐 ${message}`);
}

export function task(name: string, url: string, success: boolean, durationMs: number): void {
  const icon = success ? '✅' : '❌';
  write(
    success ? 'info' : 'warn',
    `${icon} ${name} ${url} (${String(durationMs)}ms)`,
  );
}

export function request(method: string, path: string, status: number, durationMs: number): void {
  write('debug', `↔️  ${method} ${path} → ${String(status)} (${String(durationMs)}ms)`);
}
