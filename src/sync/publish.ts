/**
 * transcript-vault - Archive Publisher
 *
 * Commits whatever the reconciler wrote and optionally pushes it. A failure
 * here never rolls back archive files: the archive may run ahead of the remote.
 */

import { ArchiveMissingError, PublishError, type PublishStage } from '../core/errors.js';
import { countUnpushedCommits, hasChanges, hasRemote, isGitRepo, type GitRunner } from '../core/git.js';
import type { SyncSummary } from './reconcile.js';

export interface PublishOptions {
  push: boolean;
}

export interface PublishResult {
  committed: boolean;
  pushed: boolean;
  message: string;
  commit_message?: string;
}

export function buildCommitMessage(summary: Pick<SyncSummary, 'machine_id' | 'synced' | 'skipped' | 'failed'>): string {
  const noun = summary.synced === 1 ? 'session' : 'sessions';
  let message = `Sync ${summary.synced} ${noun} from ${summary.machine_id}`;
  if (summary.skipped > 0 || summary.failed > 0) {
    message += ` (${summary.skipped} skipped, ${summary.failed} failed)`;
  }
  return message;
}

async function runStep(git: GitRunner, dir: string, stage: PublishStage, args: string[]): Promise<void> {
  const result = await git.run(args, dir);
  if (result.exitCode !== 0) {
    throw new PublishError(stage, result.stderr || result.stdout);
  }
}

export async function commitAndPush(
  dir: string,
  summary: SyncSummary,
  options: PublishOptions,
  git: GitRunner
): Promise<PublishResult> {
  if (!(await isGitRepo(git, dir))) {
    throw new ArchiveMissingError(dir);
  }

  let committed = false;
  let commitMessage: string | undefined;

  if (await hasChanges(git, dir)) {
    commitMessage = buildCommitMessage(summary);
    await runStep(git, dir, 'stage', ['add', '-A']);
    await runStep(git, dir, 'commit', ['commit', '-m', commitMessage]);
    committed = true;
  }

  if (!options.push) {
    return { committed, pushed: false, message: committed ? 'Committed' : 'No changes to commit', commit_message: commitMessage };
  }

  if (!(await hasRemote(git, dir))) {
    return {
      committed,
      pushed: false,
      message: committed ? 'Committed (no remote to push)' : 'No changes to commit (no remote)',
      commit_message: commitMessage,
    };
  }

  // Without a new commit, only push when earlier commits are still pending.
  const unpushed = await countUnpushedCommits(git, dir);
  if (!committed && unpushed === 0) {
    return { committed, pushed: false, message: 'Nothing to push' };
  }

  // No upstream yet (a fresh archive from --init): push the branch and track it.
  const pushArgs = unpushed === null ? ['push', '-u', 'origin', 'HEAD'] : ['push'];
  await runStep(git, dir, 'push', pushArgs);
  return {
    committed,
    pushed: true,
    message: committed ? 'Committed and pushed' : 'Pushed pending commits',
    commit_message: commitMessage,
  };
}
