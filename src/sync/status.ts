/**
 * transcript-vault - Sync Status
 *
 * Read-only report on the archive and the local session tree.
 */

import { readdir } from 'fs/promises';
import { existsSync } from 'fs';

import type { VaultConfig } from '../core/config.js';
import { countUnpushedCommits, getRemoteUrl, hasChanges, isGitRepo, type GitRunner } from '../core/git.js';
import { collectSessions } from '../sessions/reader.js';
import { machineMetadataDir } from './layout.js';

export interface SyncStatus {
  machine_id: string;
  sync_repo_path: string;
  claude_projects_path: string;
  archive_exists: boolean;
  is_git_repo: boolean;
  local_sessions: number;
  synced_sessions: number;
  pending: number;
  uncommitted_changes: boolean;
  remote_url: string | null;
  unpushed_commits: number | null;
}

async function listSyncedIds(root: string, machineId: string): Promise<Set<string>> {
  const dir = machineMetadataDir(root, machineId);
  if (!existsSync(dir)) return new Set();
  const files = await readdir(dir);
  return new Set(files.filter((f) => f.endsWith('.json')).map((f) => f.slice(0, -'.json'.length)));
}

export async function getSyncStatus(config: VaultConfig, git: GitRunner): Promise<SyncStatus> {
  const root = config.sync_repo_path;
  const archiveExists = existsSync(root);
  const gitRepo = archiveExists && (await isGitRepo(git, root));

  const local = await collectSessions(config.claude_projects_path);
  const synced = archiveExists ? await listSyncedIds(root, config.machine_id) : new Set<string>();
  const pending = local.filter((session) => !synced.has(session.sessionId)).length;

  return {
    machine_id: config.machine_id,
    sync_repo_path: root,
    claude_projects_path: config.claude_projects_path,
    archive_exists: archiveExists,
    is_git_repo: gitRepo,
    local_sessions: local.length,
    synced_sessions: synced.size,
    pending,
    uncommitted_changes: gitRepo ? await hasChanges(git, root) : false,
    remote_url: gitRepo ? await getRemoteUrl(git, root) : null,
    unpushed_commits: gitRepo ? await countUnpushedCommits(git, root) : null,
  };
}
