/**
 * Git utilities for the session archive
 *
 * All git access goes through a GitRunner so the sync path can be exercised
 * without a git binary.
 */

import { execFile } from 'child_process';
import { existsSync } from 'fs';
import path from 'path';

export interface GitCommandResult {
  stdout: string;
  stderr: string;
  exitCode: number;
}

export interface GitRunner {
  run(args: string[], cwd: string): Promise<GitCommandResult>;
}

/**
 * Runs the real git binary. Never rejects: a failing command (or a missing
 * binary / cwd) comes back as a non-zero exitCode with the reason in stderr.
 */
export function createGitRunner(env: NodeJS.ProcessEnv = process.env): GitRunner {
  return {
    run(args, cwd) {
      return new Promise((resolve) => {
        execFile('git', args, { cwd, env, maxBuffer: 16 * 1024 * 1024 }, (error, stdout, stderr) => {
          if (!error) {
            resolve({ stdout: String(stdout), stderr: String(stderr), exitCode: 0 });
            return;
          }
          const code = typeof error.code === 'number' ? error.code : 1;
          resolve({
            stdout: String(stdout ?? ''),
            stderr: String(stderr ?? '') || error.message,
            exitCode: code === 0 ? 1 : code,
          });
        });
      });
    },
  };
}

/**
 * Check if a directory is a git repository
 */
export async function isGitRepo(git: GitRunner, dir: string): Promise<boolean> {
  if (!existsSync(dir)) return false;
  const result = await git.run(['rev-parse', '--git-dir'], dir);
  return result.exitCode === 0;
}

/**
 * Check if the repo has a remote configured
 */
export async function hasRemote(git: GitRunner, dir: string): Promise<boolean> {
  const result = await git.run(['remote'], dir);
  return result.exitCode === 0 && result.stdout.trim().length > 0;
}

/**
 * Get the origin URL for a directory. Returns null outside a repo or without an origin.
 */
export async function getRemoteUrl(git: GitRunner, dir: string): Promise<string | null> {
  if (!existsSync(dir)) return null;
  const result = await git.run(['remote', 'get-url', 'origin'], dir);
  if (result.exitCode !== 0) return null;
  const url = result.stdout.trim();
  return url || null;
}

/**
 * Current branch name, or null on a detached HEAD / outside a repo.
 */
export async function getCurrentBranch(git: GitRunner, dir: string): Promise<string | null> {
  if (!existsSync(dir)) return null;
  const result = await git.run(['branch', '--show-current'], dir);
  if (result.exitCode !== 0) return null;
  const branch = result.stdout.trim();
  return branch || null;
}

/**
 * Check if there are uncommitted changes
 */
export async function hasChanges(git: GitRunner, dir: string): Promise<boolean> {
  const result = await git.run(['status', '--porcelain'], dir);
  return result.exitCode === 0 && result.stdout.trim().length > 0;
}

/**
 * Number of local commits not on the upstream branch. Null when there is no upstream.
 */
export async function countUnpushedCommits(git: GitRunner, dir: string): Promise<number | null> {
  const result = await git.run(['rev-list', '--count', '@{u}..HEAD'], dir);
  if (result.exitCode !== 0) return null;
  const count = parseInt(result.stdout.trim(), 10);
  return Number.isNaN(count) ? null : count;
}

export function hasGitDir(dir: string): boolean {
  return existsSync(path.join(dir, '.git'));
}
