#!/usr/bin/env node

/**
 * transcript-vault CLI
 *
 * Commands:
 * - sync: init the archive, show status, or sync sessions (optionally push)
 * - hook: background sync trigger for the host tool's Stop hook
 * - logs: tail the background sync log
 */

// Load environment variables from .env files
// .env.local takes precedence over .env
import { existsSync, readFileSync } from 'fs';
import { parse } from 'dotenv';

function loadEnvFile(filePath: string, override = false): void {
  if (!existsSync(filePath)) return;
  let parsed: Record<string, string>;
  try {
    parsed = parse(readFileSync(filePath, 'utf-8'));
  } catch (error) {
    console.error(`[env] Could not read ${filePath}: ${error instanceof Error ? error.message : String(error)}`);
    return;
  }
  for (const [key, value] of Object.entries(parsed)) {
    if (override || process.env[key] === undefined) {
      process.env[key] = value;
    }
  }
}

loadEnvFile('.env');
loadEnvFile('.env.local', true);

import { Command } from 'commander';

import { resolveVaultPaths } from './core/config.js';
import { registerSyncCommand } from './cli/commands/sync.js';
import { registerHookCommand } from './cli/commands/hook.js';
import { registerLogsCommand } from './cli/commands/logs.js';

const program = new Command();
const paths = resolveVaultPaths();

program
  .name('transcript-vault')
  .description('Archive conversation sessions into a git repository with machine metadata')
  .version('0.1.0');

registerSyncCommand(program, paths);
registerHookCommand(program, paths);
registerLogsCommand(program, paths);

program.parseAsync().catch((error) => {
  console.error(error instanceof Error ? error.message : String(error));
  process.exitCode = 1;
});
