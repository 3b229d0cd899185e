/**
 * transcript-vault - Hook Entry Point
 *
 * Run by the host tool when a session ends. Finds the sync program and starts
 * it in the background, then returns immediately. The host never sees the
 * outcome: results go to the log file (and a notification on failure).
 *
 *   locating -> launched | not_found | disabled
 */

import { spawn } from 'child_process';
import { existsSync } from 'fs';
import path from 'path';
import os from 'os';

import type { VaultConfig, VaultPaths } from '../core/config.js';
import { describeError } from '../core/errors.js';
import type { Logger } from '../core/logger.js';

export type HookOutcome =
  | { state: 'launched'; script: string }
  | { state: 'not_found'; candidates: string[] }
  | { state: 'disabled' };

export interface HookDeps {
  candidates: string[];
  runnerPath: string;
  logger: Logger;
  exists: (p: string) => boolean;
  /** Start the runner detached. Must not wait for it. */
  launch: (runnerPath: string, script: string) => void;
  loadConfig: () => Promise<VaultConfig>;
}

/**
 * Candidate locations for the sync program, most specific first.
 */
export function defaultHookCandidates(
  paths: VaultPaths,
  entryDir: string,
  env: NodeJS.ProcessEnv = process.env,
  homedir: string = os.homedir()
): string[] {
  const candidates: string[] = [];
  const override = env.TRANSCRIPT_VAULT_BIN?.trim();
  if (override) {
    candidates.push(override.startsWith('~/') ? path.join(homedir, override.slice(2)) : override);
  }
  candidates.push(path.join(entryDir, 'index.js'));
  candidates.push(path.join(paths.homeDir, 'bin', 'transcript-vault.js'));
  return candidates;
}

export function locateSyncProgram(candidates: string[], exists: (p: string) => boolean = existsSync): string | null {
  for (const candidate of candidates) {
    if (exists(candidate)) return candidate;
  }
  return null;
}

/**
 * Spawn the hook runner fully detached. No result channel: spawn errors are
 * written to the log and otherwise dropped.
 */
export function launchDetached(logger: Logger): HookDeps['launch'] {
  return (runnerPath, script) => {
    const child = spawn(process.execPath, [runnerPath, script], {
      detached: true,
      stdio: 'ignore',
      env: process.env,
    });
    child.on('error', (error) => {
      logger.error(`Failed to start sync: ${error.message}`);
    });
    child.unref();
  };
}

export async function runHook(deps: HookDeps): Promise<HookOutcome> {
  const { logger } = deps;

  // A broken config does not stop the launch; the sync program reports it in full.
  const config = await deps.loadConfig().catch((error: unknown) => {
    logger.warn(`Config not loaded: ${describeError(error)}`);
    return null;
  });
  if (config && !config.sync_on_save) {
    logger.info('sync_on_save disabled, skipping');
    return { state: 'disabled' };
  }

  const script = locateSyncProgram(deps.candidates, deps.exists);
  if (!script) {
    logger.error('sync program not found in any known location');
    return { state: 'not_found', candidates: deps.candidates };
  }

  logger.info(`Starting sync (script: ${script})`);
  deps.launch(deps.runnerPath, script);
  return { state: 'launched', script };
}

export function printHookSettings(command: string = 'transcript-vault hook'): string {
  const settings = {
    hooks: {
      Stop: [
        {
          hooks: [{ type: 'command', command }],
        },
      ],
    },
  };
  return JSON.stringify(settings, null, 2);
}
