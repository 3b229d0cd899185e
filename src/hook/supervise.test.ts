import { describe, expect, it, vi } from 'vitest';

import type { Logger } from '../core/logger.js';
import { superviseSync } from './supervise.js';

function memoryLogger(): Logger & { lines: string[] } {
  const lines: string[] = [];
  return {
    lines,
    log: (level, message) => lines.push(`${level} ${message}`),
    info: (message) => lines.push(`INFO ${message}`),
    warn: (message) => lines.push(`WARN ${message}`),
    error: (message) => lines.push(`ERROR ${message}`),
  };
}

describe('superviseSync', () => {
  it('logs success without notifying', async () => {
    const logger = memoryLogger();
    const runSync = vi.fn(async () => 0);
    const notify = vi.fn(() => true);

    const code = await superviseSync('/opt/tv/index.js', { logger, logFile: '/tmp/sync.log', runSync, notify });

    expect(code).toBe(0);
    expect(runSync).toHaveBeenCalledWith('/opt/tv/index.js', '/tmp/sync.log');
    expect(logger.lines).toEqual(['START sync --push (script: /opt/tv/index.js)', 'INFO Sync complete']);
    expect(notify).not.toHaveBeenCalled();
  });

  it('logs the exit code and notifies on failure', async () => {
    const logger = memoryLogger();
    const notify = vi.fn(() => false);

    const code = await superviseSync('/opt/tv/index.js', {
      logger,
      logFile: '/tmp/sync.log',
      runSync: async () => 1,
      notify,
    });

    expect(code).toBe(1);
    expect(logger.lines).toEqual(['START sync --push (script: /opt/tv/index.js)', 'ERROR sync exited with code 1']);
    expect(notify).toHaveBeenCalledWith('Sync failed, check /tmp/sync.log');
  });
});
