/**
 * Background supervisor: runs `sync --push` with output appended to the log
 * file, then records the exit status and notifies on failure.
 */

import { spawn } from 'child_process';
import { closeSync, mkdirSync, openSync } from 'fs';
import path from 'path';

import type { Logger } from '../core/logger.js';
import { notifyFailure } from './notify.js';

export interface SuperviseDeps {
  logger: Logger;
  logFile: string;
  /** Resolves with the sync process exit code. */
  runSync: (script: string, logFile: string) => Promise<number>;
  notify: (message: string) => boolean;
}

export function runSyncProcess(script: string, logFile: string): Promise<number> {
  mkdirSync(path.dirname(logFile), { recursive: true });
  const fd = openSync(logFile, 'a');

  return new Promise<number>((resolve) => {
    let done = false;
    const finish = (code: number) => {
      if (done) return;
      done = true;
      closeSync(fd);
      resolve(code);
    };

    const child = spawn(process.execPath, [script, 'sync', '--push'], {
      stdio: ['ignore', fd, fd],
      env: process.env,
    });
    child.on('error', () => finish(127));
    child.on('close', (code, signal) => finish(code ?? (signal ? 128 : 1)));
  });
}

export const defaultSuperviseNotify = (message: string): boolean => notifyFailure(message);

export async function superviseSync(script: string, deps: SuperviseDeps): Promise<number> {
  const { logger } = deps;
  logger.log('START', `sync --push (script: ${script})`);
  const exitCode = await deps.runSync(script, deps.logFile);

  if (exitCode === 0) {
    logger.info('Sync complete');
    return exitCode;
  }

  logger.error(`sync exited with code ${exitCode}`);
  deps.notify(`Sync failed, check ${deps.logFile}`);
  return exitCode;
}
