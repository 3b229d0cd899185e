/**
 * File logger for background work (hook, hook runner).
 *
 * Lines look like `[2025-01-02 03:04:05] ERROR message`. Interactive commands
 * log to the console instead.
 */

import { appendFileSync, mkdirSync } from 'fs';
import path from 'path';

export type LogLevel = 'INFO' | 'WARN' | 'ERROR' | 'START';

export interface Logger {
  log(level: LogLevel, message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export function formatLogLine(level: LogLevel, message: string, now: Date = new Date()): string {
  const timestamp = now.toISOString().replace('T', ' ').slice(0, 19);
  return `[${timestamp}] ${level.padEnd(5)} ${message}\n`;
}

export function createFileLogger(logFile: string, clock: () => Date = () => new Date()): Logger {
  let dirReady = false;

  function log(level: LogLevel, message: string): void {
    if (!dirReady) {
      mkdirSync(path.dirname(logFile), { recursive: true });
      dirReady = true;
    }
    appendFileSync(logFile, formatLogLine(level, message, clock()));
  }

  return {
    log,
    info: (message) => log('INFO', message),
    warn: (message) => log('WARN', message),
    error: (message) => log('ERROR', message),
  };
}

/**
 * Wraps a logger so a write failure (unwritable log dir, full disk) is handed
 * to `onError` instead of thrown. Used where logging must never change the
 * outcome, such as the host tool's hook.
 */
export function bestEffortLogger(logger: Logger, onError: (error: unknown) => void): Logger {
  function log(level: LogLevel, message: string): void {
    try {
      logger.log(level, message);
    } catch (error) {
      onError(error);
    }
  }

  return {
    log,
    info: (message) => log('INFO', message),
    warn: (message) => log('WARN', message),
    error: (message) => log('ERROR', message),
  };
}
