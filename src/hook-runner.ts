#!/usr/bin/env node
/**
 * Hook Runner
 *
 * Started detached by `transcript-vault hook`. Runs one `sync --push` with its
 * output appended to ~/.transcript-vault/sync.log and exits. Nothing here is
 * reported back to the host tool.
 */

import { resolveVaultPaths } from './core/config.js';
import { createFileLogger } from './core/logger.js';
import { defaultSuperviseNotify, runSyncProcess, superviseSync } from './hook/supervise.js';

const paths = resolveVaultPaths();
const logger = createFileLogger(paths.logFile);
const script = process.argv[2];

async function main(): Promise<void> {
  if (!script) {
    logger.error('hook runner started without a sync program path');
    process.exitCode = 1;
    return;
  }

  process.exitCode = await superviseSync(script, {
    logger,
    logFile: paths.logFile,
    runSync: runSyncProcess,
    notify: defaultSuperviseNotify,
  });
}

main().catch((error) => {
  logger.error(`Hook runner crashed: ${error instanceof Error ? error.message : String(error)}`);
  process.exitCode = 1;
});
