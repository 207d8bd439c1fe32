import { describe, expect, it, vi } from 'vitest';

import { createLogger, resetLogHandler, setLogHandler, setLogLevel } from '../../../src/core/logger.js';
import type { LogEntry } from '../../../src/core/logger.js';
import { registerSecret } from '../../../src/core/secrets.js';

describe('logger', () => {
  it('suppresses entries below the minimum level', () => {
    const entries: LogEntry[] = [];
    setLogHandler((entry) => entries.push(entry));
    setLogLevel('warn');

    const log = createLogger();
    log.info('hidden');
    log.warn('shown');

    expect(entries.map((entry) => entry.message)).toEqual(['shown']);
  });

  it('merges child context over the base context', () => {
    const entries: LogEntry[] = [];
    setLogHandler((entry) => entries.push(entry));

    createLogger({ component: 'doc-publish', jobId: 'a' }).child({ jobId: 'b' }).info('step started', { step: 'build' });

    expect(entries[0]?.context).toEqual({ component: 'doc-publish', jobId: 'b', step: 'build' });
  });

  it('writes masked JSON lines to stderr by default', () => {
    resetLogHandler();
    const write = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
    registerSecret('test-secret-token');

    try {
      createLogger({ component: 'doc-publish' }).error('push failed for test-secret-token');

      const line = String(write.mock.calls[0]?.[0]);
      expect(JSON.parse(line)).toMatchObject({
        level: 'error',
        msg: 'push failed for ***',
        component: 'doc-publish'
      });
    } finally {
      write.mockRestore();
    }
  });
});
