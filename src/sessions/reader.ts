/**
 * transcript-vault - Session Source Reader
 *
 * The host tool stores conversations in <projects>/<project-dir>/<session-id>.jsonl.
 * Listing re-scans the tree on every call; nothing is cached between runs.
 */

import { readFile, readdir, stat } from 'fs/promises';
import type { Dirent } from 'fs';
import path from 'path';

import { UnreadableSessionError } from '../core/errors.js';
import { recordSchema, type JsonObject, type ReadSessionResult, type SessionEntry, type SessionFile } from './types.js';

async function readDirSorted(dir: string): Promise<Dirent[]> {
  try {
    const entries = await readdir(dir, { withFileTypes: true });
    return entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
  } catch (error) {
    const err = error as NodeJS.ErrnoException;
    if (err.code === 'ENOENT' || err.code === 'ENOTDIR') {
      return [];
    }
    throw err;
  }
}

/**
 * Yield every session file under the projects directory.
 * Hidden project directories are ignored; a missing root yields nothing.
 */
export async function* listSessions(projectsPath: string): AsyncGenerator<SessionFile> {
  for (const projectDir of await readDirSorted(projectsPath)) {
    if (!projectDir.isDirectory() || projectDir.name.startsWith('.')) continue;

    const projectPath = path.join(projectsPath, projectDir.name);
    for (const file of await readDirSorted(projectPath)) {
      if (!file.isFile() || !file.name.endsWith('.jsonl')) continue;

      yield {
        sessionId: file.name.slice(0, -'.jsonl'.length),
        filePath: path.join(projectPath, file.name),
        projectDir: projectDir.name,
      };
    }
  }
}

/**
 * All sessions, ordered by session id (then path) so runs log deterministically.
 */
export async function collectSessions(projectsPath: string): Promise<SessionFile[]> {
  const sessions: SessionFile[] = [];
  for await (const session of listSessions(projectsPath)) {
    sessions.push(session);
  }
  return sessions.sort((a, b) => {
    if (a.sessionId !== b.sessionId) return a.sessionId < b.sessionId ? -1 : 1;
    return a.filePath < b.filePath ? -1 : a.filePath > b.filePath ? 1 : 0;
  });
}

function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Parse one log line. Returns null for malformed JSON or non-object values.
 */
export function parseSessionLine(line: string): SessionEntry | null {
  let value: unknown;
  try {
    value = JSON.parse(line);
  } catch {
    return null;
  }
  if (!isJsonObject(value)) return null;

  const parsed = recordSchema.safeParse(value);
  if (!parsed.success) return null;
  const record = parsed.data;

  const base = {
    raw: line,
    value,
    timestamp: record.timestamp,
    cwd: record.cwd,
    gitBranch: record.gitBranch,
    sessionId: record.sessionId,
  };

  switch (record.type) {
    case 'user':
      return { ...base, kind: 'user', message: record.message };
    case 'assistant':
      return { ...base, kind: 'assistant', message: record.message };
    case 'summary':
      return { ...base, kind: 'summary', summary: record.summary };
    case 'system':
      return { ...base, kind: 'system' };
    default:
      return { ...base, kind: 'other', type: record.type };
  }
}

/**
 * Parse a session file line by line. Malformed lines are counted, not fatal;
 * only a file that cannot be read at all raises UnreadableSessionError.
 */
export async function readSession(filePath: string): Promise<ReadSessionResult> {
  let content: string;
  let size: number;
  let mtimeMs: number;
  try {
    const info = await stat(filePath);
    content = await readFile(filePath, 'utf-8');
    size = info.size;
    mtimeMs = info.mtimeMs;
  } catch (error) {
    throw new UnreadableSessionError(filePath, error);
  }

  const entries: SessionEntry[] = [];
  let skippedLines = 0;

  for (const rawLine of content.split('\n')) {
    const line = rawLine.endsWith('\r') ? rawLine.slice(0, -1) : rawLine;
    if (!line.trim()) continue;

    const entry = parseSessionLine(line);
    if (entry) {
      entries.push(entry);
    } else {
      skippedLines++;
    }
  }

  return { entries, skippedLines, size, mtimeMs };
}
