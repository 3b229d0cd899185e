/**
 * transcript-vault - Metadata Extractor
 *
 * Summarises a parsed session (timing, model, working directory, git context).
 * Git lookups are best-effort: a missing repo or binary leaves the field null.
 */

import { getCurrentBranch, getRemoteUrl, type GitRunner } from '../core/git.js';
import type { SessionEntry } from './types.js';

export interface SessionMetadata {
  session_id: string;
  machine_id: string;
  original_path: string;
  cwd: string | null;
  git_remote: string | null;
  git_branch: string | null;
  model: string | null;
  message_count: number;
  started_at: string | null;
  ended_at: string | null;
  duration_seconds: number | null;
  synced_at: string;
  source_file: string;
  source_size: number;
  source_mtime_ms: number;
  include_thinking: boolean;
  content_hash: string;
  skipped_lines: number;
}

export interface SessionFileContext {
  sessionId: string;
  filePath: string;
  projectDir: string;
  size: number;
  mtimeMs: number;
  skippedLines: number;
  contentHash: string;
}

export interface ExtractContext {
  machineId: string;
  includeThinking: boolean;
  git: GitRunner;
  clock: () => Date;
}

/**
 * The host tool names project directories after the working directory with
 * separators replaced by dashes: -Users-me-code-app -> /Users/me/code/app.
 * Dashes inside directory names are indistinguishable, so this is a best guess.
 */
export function deriveOriginalPath(projectDirName: string): string {
  return '/' + projectDirName.replace(/^-+/, '').replace(/-/g, '/');
}

function toIso(ms: number): string {
  return new Date(ms).toISOString();
}

function parseTime(value: string | null): number | null {
  if (!value) return null;
  const parsed = Date.parse(value);
  return Number.isNaN(parsed) ? null : parsed;
}

/**
 * Archive date folder (UTC YYYY-MM-DD): session start, else file mtime.
 */
export function sessionDate(startedAt: string | null, mtimeMs: number): string {
  const started = parseTime(startedAt);
  return toIso(started ?? mtimeMs).slice(0, 10);
}

export interface SessionTiming {
  started_at: string | null;
  ended_at: string | null;
  duration_seconds: number | null;
}

/**
 * First and last record timestamps. Records without any timestamp fall back
 * to the file mtime (duration unknown); an empty session has no timing at all.
 */
export function sessionTiming(entries: SessionEntry[], mtimeMs: number): SessionTiming {
  let first: string | null = null;
  let last: string | null = null;
  for (const entry of entries) {
    if (!entry.timestamp) continue;
    if (!first) first = entry.timestamp;
    last = entry.timestamp;
  }

  if (first && last) {
    const start = parseTime(first);
    const end = parseTime(last);
    return {
      started_at: first,
      ended_at: last,
      duration_seconds: start !== null && end !== null ? (end - start) / 1000 : null,
    };
  }

  if (entries.length > 0) {
    const fallback = toIso(mtimeMs);
    return { started_at: fallback, ended_at: fallback, duration_seconds: null };
  }

  return { started_at: null, ended_at: null, duration_seconds: null };
}

export async function extractMetadata(
  entries: SessionEntry[],
  file: SessionFileContext,
  context: ExtractContext
): Promise<SessionMetadata> {
  let cwd: string | null = null;
  let gitBranch: string | null = null;
  let model: string | null = null;

  for (const entry of entries) {
    if (!cwd && entry.cwd) cwd = entry.cwd;
    if (!gitBranch && entry.gitBranch) gitBranch = entry.gitBranch;
    if (entry.kind === 'assistant' && entry.message?.model) {
      model = entry.message.model;
    }
  }

  const timing = sessionTiming(entries, file.mtimeMs);

  let gitRemote: string | null = null;
  if (cwd) {
    gitRemote = await getRemoteUrl(context.git, cwd).catch(() => null);
    if (!gitBranch) {
      gitBranch = await getCurrentBranch(context.git, cwd).catch(() => null);
    }
  }

  return {
    session_id: file.sessionId,
    machine_id: context.machineId,
    original_path: deriveOriginalPath(file.projectDir),
    cwd,
    git_remote: gitRemote,
    git_branch: gitBranch,
    model,
    message_count: entries.length,
    started_at: timing.started_at,
    ended_at: timing.ended_at,
    duration_seconds: timing.duration_seconds,
    synced_at: context.clock().toISOString(),
    source_file: file.filePath,
    source_size: file.size,
    source_mtime_ms: file.mtimeMs,
    include_thinking: context.includeThinking,
    content_hash: file.contentHash,
    skipped_lines: file.skippedLines,
  };
}
