/**
 * Logs Command
 */

import type { Command } from 'commander';
import { existsSync, readFileSync } from 'fs';

import type { VaultPaths } from '../../core/config.js';

export function tailLines(content: string, n: number): string[] {
  const lines = content.trim().split('\n').filter((line) => line.length > 0);
  return n > 0 ? lines.slice(-n) : [];
}

export function registerLogsCommand(program: Command, paths: VaultPaths): void {
  program
    .command('logs')
    .description('View background sync logs')
    .option('-n, --lines <n>', 'Number of lines to show', '50')
    .action((options: { lines: string }) => {
      if (!existsSync(paths.logFile)) {
        console.log('No log file found. The hook may not have run yet.');
        console.log(`Expected: ${paths.logFile}`);
        return;
      }

      const n = parseInt(options.lines, 10);
      const lastLines = tailLines(readFileSync(paths.logFile, 'utf-8'), Number.isNaN(n) ? 50 : n);

      console.log(`Last ${lastLines.length} log entries:\n`);
      console.log(lastLines.join('\n'));
    });
}
