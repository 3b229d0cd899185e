/**
 * Hook Command
 *
 * Registered in the host tool's settings under hooks.Stop. Always exits 0 so a
 * sync problem can never fail or block the host session.
 */

import type { Command } from 'commander';
import { existsSync } from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';

import { loadConfig, type VaultPaths } from '../../core/config.js';
import { describeError } from '../../core/errors.js';
import { bestEffortLogger, createFileLogger } from '../../core/logger.js';
import { defaultHookCandidates, launchDetached, printHookSettings, runHook } from '../../hook/entry.js';

// Get the directory of this module (for finding hook-runner.js)
const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

export function registerHookCommand(program: Command, paths: VaultPaths): void {
  program
    .command('hook')
    .description('Start a background sync (run by the host tool at session end)')
    .option('--print-config', 'Print the host settings snippet that registers this hook')
    .action(async (options: { printConfig?: boolean }) => {
      if (options.printConfig) {
        console.log(printHookSettings());
        return;
      }

      // stderr is the fallback when the log file cannot be written; the host ignores it.
      const logger = bestEffortLogger(createFileLogger(paths.logFile), (error) => {
        console.error(`[hook] cannot write ${paths.logFile}: ${describeError(error)}`);
      });
      const distDir = path.join(__dirname, '..', '..');
      try {
        await runHook({
          candidates: defaultHookCandidates(paths, distDir),
          runnerPath: path.join(distDir, 'hook-runner.js'),
          logger,
          exists: existsSync,
          launch: launchDetached(logger),
          loadConfig: () => loadConfig(paths),
        });
      } catch (error) {
        logger.error(`Hook failed: ${describeError(error)}`);
      }
      process.exitCode = 0;
    });
}
