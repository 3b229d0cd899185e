/**
 * Session log record shapes.
 *
 * The host tool writes one JSON object per line. Known record types get their
 * own variant; everything else is kept as `other` so it round-trips untouched.
 */

import { z } from 'zod';

export type JsonObject = Record<string, unknown>;

// Field types are lenient: a value of the wrong type is dropped, not fatal.
const optionalString = z.string().optional().catch(undefined);

export const contentBlockSchema = z.object({ type: z.string() }).passthrough();

export const messageSchema = z
  .object({
    role: optionalString,
    model: optionalString,
    content: z.union([z.string(), z.array(contentBlockSchema)]).optional().catch(undefined),
  })
  .passthrough();

export const recordSchema = z
  .object({
    type: optionalString,
    timestamp: optionalString,
    cwd: optionalString,
    gitBranch: optionalString,
    sessionId: optionalString,
    summary: optionalString,
    message: messageSchema.optional().catch(undefined),
  })
  .passthrough();

export type ContentBlock = z.infer<typeof contentBlockSchema>;
export type SessionMessage = z.infer<typeof messageSchema>;

interface EntryBase {
  /** Original line, without the trailing newline. */
  raw: string;
  value: JsonObject;
  timestamp?: string;
  cwd?: string;
  gitBranch?: string;
  sessionId?: string;
}

export interface UserEntry extends EntryBase {
  kind: 'user';
  message?: SessionMessage;
}

export interface AssistantEntry extends EntryBase {
  kind: 'assistant';
  message?: SessionMessage;
}

export interface SummaryEntry extends EntryBase {
  kind: 'summary';
  summary?: string;
}

export interface SystemEntry extends EntryBase {
  kind: 'system';
}

export interface OtherEntry extends EntryBase {
  kind: 'other';
  type?: string;
}

export type SessionEntry = UserEntry | AssistantEntry | SummaryEntry | SystemEntry | OtherEntry;

export interface SessionFile {
  sessionId: string;
  filePath: string;
  /** Name of the project directory the file was found in. */
  projectDir: string;
}

export interface ReadSessionResult {
  entries: SessionEntry[];
  skippedLines: number;
  size: number;
  mtimeMs: number;
}
