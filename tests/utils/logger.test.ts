import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';

import * as log from '../../src/utils/logger.js';

describe('logger', () => {
  let lines: string[];
  let previous: ReturnType<typeof log.getLogLevel>;

  beforeEach(() => {
    lines = [];
    previous = log.getLogLevel();
    vi.spyOn(process.stderr, 'write').mockImplementation((chunk: unknown) => {
      lines.push(String(chunk));
      return true;
    });
  });

  afterEach(() => {
    vi.restoreAllMocks();
    log.setLogLevel(previous);
  });

  it('writes one prefixed line per call', () => {
    log.setLogLevel('info');
    log.info('ready');
    log.warn('careful');

    expect(lines).toEqual(['ℹ️  ready\n', '⚠️  careful\n']);
  });

  it('drops messages below the threshold', () => {
    log.setLogLevel('warn');
    log.debug('noise');
    log.info('chatter');
    log.error('broken');

    expect(lines).toEqual(['💥 broken\n']);
  });

  it('formats task outcomes', () => {
    log.setLogLevel('info');
    log.task('screenshot', 'https://example.test/', true, 42);
    log.task('content', 'https://example.test/', false, 7);

    expect(lines).toEqual([
      '✅ screenshot https://example.test/ (42ms)\n',
      '❌ content https://example.test/ (7ms)\n',
    ]);
  });

  it('logs requests at debug level only', () => {
    log.setLogLevel('info');
    log.request('GET', '/health', 200, 3);
    expect(lines).toEqual([]);

    log.setLogLevel('debug');
    log.request('GET', '/health', 200, 3);
    expect(lines).toEqual(['↔️  GET /health → 200 (3ms)\n']);
  });
});
