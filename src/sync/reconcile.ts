/**
 * transcript-vault - Sync Reconciler
 *
 * Decides which sessions need (re)writing and copies them into the archive.
 *
 * Dirty check, cheapest first:
 *   1. Marker: metadata file records the same source size, mtime, source path
 *      and include_thinking flag, and the archived copy exists -> skip unread.
 *   2. Content: the filtered, serialized session hashes to the same sha256 as
 *      the archived copy -> no session write (metadata marker is refreshed).
 *   3. Otherwise write the session file, then its metadata.
 *
 * Sessions run one at a time in session-id order. A failing session is
 * recorded in the summary; it never aborts the batch. When two project
 * directories hold the same session id, the first by path is archived and the
 * other is recorded as a failure.
 */

import { mkdir, readFile, stat, writeFile } from 'fs/promises';
import { existsSync } from 'fs';
import path from 'path';
import { z } from 'zod';

import type { VaultConfig } from '../core/config.js';
import { ArchiveMissingError, DuplicateSessionError, describeError } from '../core/errors.js';
import type { GitRunner } from '../core/git.js';
import { extractMetadata, sessionDate, sessionTiming, type SessionMetadata } from '../sessions/metadata.js';
import { collectSessions, readSession } from '../sessions/reader.js';
import type { SessionFile } from '../sessions/types.js';
import { filterEntries, hashContent, serializeEntries } from './filter.js';
import { metadataArchivePath, sessionArchivePath } from './layout.js';

// ============================================================================
// Types
// ============================================================================

export interface SyncContext {
  config: VaultConfig;
  git: GitRunner;
  clock: () => Date;
}

export type SkipReason = 'marker' | 'content';

export interface SyncLogger {
  onSynced?(session: SessionFile, metadata: SessionMetadata): void;
  onSkipped?(session: SessionFile, reason: SkipReason): void;
  onFailed?(session: SessionFile, error: unknown): void;
  onWarning?(message: string): void;
}

export interface SyncOptions {
  dryRun?: boolean;
  logger?: SyncLogger;
}

export interface SyncFailure {
  session_id: string;
  file_path: string;
  error: string;
}

export interface SyncSummary {
  machine_id: string;
  total: number;
  synced: number;
  skipped: number;
  failed: number;
  synced_ids: string[];
  failures: SyncFailure[];
}

type SessionOutcome = { status: 'synced'; metadata: SessionMetadata } | { status: 'skipped'; reason: SkipReason };

// Only the fields the marker check needs; the rest of the file is ignored.
const markerSchema = z
  .object({
    source_file: z.string(),
    source_size: z.number(),
    source_mtime_ms: z.number(),
    include_thinking: z.boolean(),
    started_at: z.string().nullable(),
  })
  .passthrough();

type SyncMarker = z.infer<typeof markerSchema>;

// ============================================================================
// Helpers
// ============================================================================

async function readMarker(metadataPath: string): Promise<SyncMarker | null> {
  if (!existsSync(metadataPath)) return null;
  try {
    const parsed = markerSchema.safeParse(JSON.parse(await readFile(metadataPath, 'utf-8')));
    return parsed.success ? parsed.data : null;
  } catch {
    // Unreadable or corrupt metadata just means the session is re-checked in full.
    return null;
  }
}

async function hashExisting(filePath: string): Promise<string | null> {
  if (!existsSync(filePath)) return null;
  return hashContent(await readFile(filePath));
}

async function writeJson(filePath: string, value: unknown): Promise<void> {
  await mkdir(path.dirname(filePath), { recursive: true });
  await writeFile(filePath, JSON.stringify(value, null, 2) + '\n');
}

// ============================================================================
// Per-session reconciliation
// ============================================================================

async function reconcileSession(
  session: SessionFile,
  context: SyncContext,
  dryRun: boolean
): Promise<SessionOutcome> {
  const { config } = context;
  const root = config.sync_repo_path;
  const machineId = config.machine_id;
  const metadataPath = metadataArchivePath(root, machineId, session.sessionId);

  const marker = await readMarker(metadataPath);
  if (marker) {
    const source = await stat(session.filePath).catch(() => null);
    if (
      source &&
      marker.source_file === session.filePath &&
      marker.source_size === source.size &&
      marker.source_mtime_ms === source.mtimeMs &&
      marker.include_thinking === config.include_thinking &&
      existsSync(sessionArchivePath(root, machineId, sessionDate(marker.started_at, marker.source_mtime_ms), session.sessionId))
    ) {
      return { status: 'skipped', reason: 'marker' };
    }
  }

  const read = await readSession(session.filePath);
  const content = serializeEntries(filterEntries(read.entries, config.include_thinking));
  const contentHash = hashContent(content);

  const timing = sessionTiming(read.entries, read.mtimeMs);
  const archivePath = sessionArchivePath(root, machineId, sessionDate(timing.started_at, read.mtimeMs), session.sessionId);
  const contentUnchanged = (await hashExisting(archivePath)) === contentHash;

  const metadata = await extractMetadata(
    read.entries,
    { ...session, size: read.size, mtimeMs: read.mtimeMs, skippedLines: read.skippedLines, contentHash },
    { machineId, includeThinking: config.include_thinking, git: context.git, clock: context.clock }
  );

  if (contentUnchanged) {
    if (!dryRun) await writeJson(metadataPath, metadata);
    return { status: 'skipped', reason: 'content' };
  }

  if (!dryRun) {
    await mkdir(path.dirname(archivePath), { recursive: true });
    await writeFile(archivePath, content);
    await writeJson(metadataPath, metadata);
  }
  return { status: 'synced', metadata };
}

// ============================================================================
// Batch
// ============================================================================

export async function syncSessions(context: SyncContext, options: SyncOptions = {}): Promise<SyncSummary> {
  const { config } = context;
  const { dryRun = false, logger } = options;

  if (!existsSync(config.sync_repo_path)) {
    throw new ArchiveMissingError(config.sync_repo_path);
  }

  const summary: SyncSummary = {
    machine_id: config.machine_id,
    total: 0,
    synced: 0,
    skipped: 0,
    failed: 0,
    synced_ids: [],
    failures: [],
  };

  if (!existsSync(config.claude_projects_path)) {
    logger?.onWarning?.(`Projects directory not found: ${config.claude_projects_path}`);
    return summary;
  }

  const sessions = await collectSessions(config.claude_projects_path);
  summary.total = sessions.length;

  const firstPathById = new Map<string, string>();

  for (const session of sessions) {
    try {
      const firstPath = firstPathById.get(session.sessionId);
      if (firstPath !== undefined) {
        throw new DuplicateSessionError(session.sessionId, session.filePath, firstPath);
      }
      firstPathById.set(session.sessionId, session.filePath);

      const outcome = await reconcileSession(session, context, dryRun);
      if (outcome.status === 'synced') {
        summary.synced++;
        summary.synced_ids.push(session.sessionId);
        logger?.onSynced?.(session, outcome.metadata);
      } else {
        summary.skipped++;
        logger?.onSkipped?.(session, outcome.reason);
      }
    } catch (error) {
      summary.failed++;
      summary.failures.push({
        session_id: session.sessionId,
        file_path: session.filePath,
        error: describeError(error),
      });
      logger?.onFailed?.(session, error);
    }
  }

  return summary;
}
