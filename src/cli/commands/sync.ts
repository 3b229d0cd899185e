/**
 * Sync Command
 *
 * sync --init | sync --status | sync [--push]
 */

import type { Command } from 'commander';

import { c } from '../colors.js';
import { initConfig, loadConfig, type VaultConfig, type VaultPaths } from '../../core/config.js';
import { describeError, isVaultError } from '../../core/errors.js';
import { createGitRunner, type GitRunner } from '../../core/git.js';
import type { SyncLogger, SyncSummary } from '../../sync/reconcile.js';

export interface SyncCommandOptions {
  init?: boolean;
  status?: boolean;
  push?: boolean;
  dryRun?: boolean;
  remote?: string;
  machineId?: string;
  projectsPath?: string;
  repoPath?: string;
  includeThinking?: boolean;
}

export interface CommandDeps {
  paths: VaultPaths;
  git: GitRunner;
  clock: () => Date;
}

function reportError(error: unknown): number {
  if (isVaultError(error)) {
    console.error(`\n${c.error(error.code)} ${error.message}\n`);
  } else {
    console.error(`\nError: ${describeError(error)}\n`);
  }
  return 1;
}

// ============================================================================
// --init
// ============================================================================

export async function handleInit(options: SyncCommandOptions, deps: CommandDeps): Promise<number> {
  try {
    const { config, archive } = await initConfig(
      deps.paths,
      {
        machineId: options.machineId,
        remote: options.remote,
        projectsPath: options.projectsPath,
        repoPath: options.repoPath,
        includeThinking: options.includeThinking,
      },
      deps.git
    );

    console.log(`\n  ${c.success('✓')} Config saved to ${c.path(deps.paths.configFile)}`);
    console.log(`    Machine ID: ${c.bold(config.machine_id)}`);
    console.log(`    Archive:    ${config.sync_repo_path}`);
    console.log(`    Sessions:   ${config.claude_projects_path}`);

    if (!archive.gitInitialized) {
      console.log(`\n  ${c.warning('⚠')} Archive created but git setup failed: ${archive.error ?? 'unknown error'}`);
      return 1;
    }
    console.log(`  ${c.success('✓')} Initialized archive at ${c.path(config.sync_repo_path)}`);
    if (archive.remoteAdded) {
      console.log(`  ${c.success('✓')} Remote: ${options.remote}`);
    } else if (archive.error) {
      console.log(`  ${c.warning('⚠')} Remote not added: ${archive.error}`);
    }
    console.log('');
    return 0;
  } catch (error) {
    return reportError(error);
  }
}

// ============================================================================
// --status
// ============================================================================

export async function handleStatus(deps: CommandDeps): Promise<number> {
  let config: VaultConfig;
  try {
    config = await loadConfig(deps.paths);
  } catch (error) {
    return reportError(error);
  }

  const { getSyncStatus } = await import('../../sync/status.js');
  const status = await getSyncStatus(config, deps.git);

  console.log('');
  console.log(c.title('transcript-vault status'));
  console.log(`Machine ID:      ${status.machine_id}`);
  console.log(`Archive:         ${status.sync_repo_path}`);
  console.log(`Session source:  ${status.claude_projects_path}`);
  console.log('');

  if (!status.archive_exists) {
    console.log(c.warning('Status: archive not initialized (run with --init)'));
    return 1;
  }

  console.log(`Local sessions:  ${status.local_sessions}`);
  console.log(`Synced:          ${status.synced_sessions}`);
  console.log(`Pending:         ${status.pending}`);

  if (!status.is_git_repo) {
    console.log(c.warning('\nArchive is not a git repository'));
    return 0;
  }
  if (status.uncommitted_changes) {
    console.log(c.warning('\nUncommitted changes in archive'));
  }
  if (status.remote_url) {
    console.log(`\nRemote: ${status.remote_url}`);
    if (status.unpushed_commits !== null && status.unpushed_commits > 0) {
      console.log(c.warning(`${status.unpushed_commits} unpushed commit(s)`));
    }
  } else {
    console.log(c.dim('\nNo remote configured'));
  }
  console.log('');
  return 0;
}

// ============================================================================
// sync [--push]
// ============================================================================

function consoleSyncLogger(): SyncLogger {
  return {
    onSynced: (session) => {
      console.log(`  ${c.success('✓')} ${session.sessionId.slice(0, 8)}... ${c.dim(`(${session.projectDir})`)}`);
    },
    onFailed: (session, error) => {
      console.log(`  ${c.warning('✗')} ${session.sessionId.slice(0, 8)}... Error: ${describeError(error)}`);
    },
    onWarning: (message) => {
      console.log(c.warning(`  ⚠ ${message}`));
    },
  };
}

function printSummary(summary: SyncSummary, dryRun: boolean): void {
  const verb = dryRun ? 'would sync' : 'synced';
  console.log(
    `\nSync complete: ${summary.synced} ${verb}, ${summary.skipped} skipped, ${summary.failed} failed (${summary.total} total)`
  );
}

export async function handleSync(options: SyncCommandOptions, deps: CommandDeps): Promise<number> {
  let config: VaultConfig;
  try {
    config = await loadConfig(deps.paths);
  } catch (error) {
    return reportError(error);
  }
  if (options.machineId?.trim()) {
    config = { ...config, machine_id: options.machineId.trim() };
  }

  const { syncSessions } = await import('../../sync/reconcile.js');
  const { commitAndPush } = await import('../../sync/publish.js');

  console.log(`\ntranscript-vault sync`);
  console.log(`=====================`);
  console.log(`Machine: ${config.machine_id}`);
  console.log(`Archive: ${config.sync_repo_path}`);
  if (options.dryRun) console.log(`Mode: DRY RUN`);
  console.log('');

  let summary: SyncSummary;
  try {
    summary = await syncSessions(
      { config, git: deps.git, clock: deps.clock },
      { dryRun: options.dryRun, logger: consoleSyncLogger() }
    );
  } catch (error) {
    return reportError(error);
  }

  printSummary(summary, options.dryRun === true);
  if (options.dryRun) return 0;

  try {
    const result = await commitAndPush(config.sync_repo_path, summary, { push: options.push === true }, deps.git);
    if (result.committed) {
      console.log(`${c.success('✓')} Committed: ${result.commit_message}`);
    }
    if (result.pushed) {
      console.log(`${c.success('✓')} Pushed to remote`);
    } else if (options.push) {
      console.log(c.dim(result.message));
    }
  } catch (error) {
    // Archive files stay written; the remote just lags behind.
    console.error(`[git] ${describeError(error)}`);
    return 1;
  }

  return 0;
}

export function registerSyncCommand(program: Command, paths: VaultPaths): void {
  program
    .command('sync')
    .description('Sync host conversation sessions into the git archive')
    .option('--init', 'Create the config file and an empty archive')
    .option('--status', 'Show sync status')
    .option('--push', 'Push to the remote after committing')
    .option('--dry-run', 'Show what would be synced without writing')
    .option('--remote <url>', 'Git remote URL (with --init)')
    .option('--machine-id <id>', 'Machine ID (saved with --init, one-off override otherwise)')
    .option('--projects-path <path>', 'Session source directory (with --init)')
    .option('--repo-path <path>', 'Archive repository path (with --init)')
    .option('--include-thinking', 'Keep thinking blocks in archived sessions (with --init)')
    .action(async (options: SyncCommandOptions) => {
      const deps: CommandDeps = { paths, git: createGitRunner(), clock: () => new Date() };

      if (options.init) {
        process.exitCode = await handleInit(options, deps);
        return;
      }
      if (options.status) {
        process.exitCode = await handleStatus(deps);
        return;
      }
      process.exitCode = await handleSync(options, deps);
    });
}
