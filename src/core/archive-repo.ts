/**
 * transcript-vault - Archive Repository Helpers
 *
 * Creates the directory layout and git repository that sessions are synced into.
 */

import { mkdir, writeFile } from 'fs/promises';
import { existsSync } from 'fs';
import path from 'path';

import { getRemoteUrl, hasGitDir, type GitRunner } from './git.js';

export const SESSIONS_DIR = 'sessions';
export const METADATA_DIR = 'metadata';

export interface InitArchiveResult {
  gitInitialized: boolean;
  remoteAdded: boolean;
  error?: string;
}

const README_CONTENT = `# Session Archive

Conversation sessions synced by transcript-vault, one directory tree per machine.

## Structure

\`\`\`
sessions/
  <machine-id>/
    <date>/
      <session-id>.jsonl      # Conversation log (thinking blocks optional)
metadata/
  <machine-id>/
    <session-id>.json         # Session metadata (timing, model, git context)
\`\`\`

Files are overwritten when a session changes and are never deleted by the sync.
`;

function describeGitFailure(stderr: string): string {
  const lower = stderr.toLowerCase();
  if (lower.includes('enoent') || lower.includes('command not found')) {
    return 'Git is not installed';
  }
  if (lower.includes('user.email') || lower.includes('user.name') || lower.includes('please tell me who you are')) {
    return 'Git user not configured. Run: git config --global user.email "you@example.com" && git config --global user.name "Your Name"';
  }
  return stderr.trim().slice(0, 200);
}

/**
 * Initialize an archive repository at the given path.
 * Creates directory structure, .gitignore, README, and git init.
 * Idempotent: existing files and an existing repository are left alone.
 */
export async function initArchiveRepo(
  dirPath: string,
  git: GitRunner,
  remoteUrl?: string
): Promise<InitArchiveResult> {
  await mkdir(dirPath, { recursive: true });

  for (const sub of [SESSIONS_DIR, METADATA_DIR]) {
    await mkdir(path.join(dirPath, sub), { recursive: true });
    const keep = path.join(dirPath, sub, '.gitkeep');
    if (!existsSync(keep)) {
      await writeFile(keep, '');
    }
  }

  const gitignorePath = path.join(dirPath, '.gitignore');
  if (!existsSync(gitignorePath)) {
    await writeFile(gitignorePath, `.DS_Store\n*.tmp\n`);
  }

  const readmePath = path.join(dirPath, 'README.md');
  if (!existsSync(readmePath)) {
    await writeFile(readmePath, README_CONTENT);
  }

  if (!hasGitDir(dirPath)) {
    for (const args of [['init'], ['add', '.'], ['commit', '-m', 'Initial commit']]) {
      const result = await git.run(args, dirPath);
      if (result.exitCode !== 0) {
        return { gitInitialized: false, remoteAdded: false, error: describeGitFailure(result.stderr) };
      }
    }
  }

  let remoteAdded = false;
  if (remoteUrl && !(await getRemoteUrl(git, dirPath))) {
    const result = await git.run(['remote', 'add', 'origin', remoteUrl], dirPath);
    if (result.exitCode !== 0) {
      return { gitInitialized: true, remoteAdded: false, error: describeGitFailure(result.stderr) };
    }
    remoteAdded = true;
  }

  return { gitInitialized: true, remoteAdded };
}
