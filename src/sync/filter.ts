/**
 * Thinking-payload filtering and archive serialization.
 */

import { createHash } from 'crypto';

import { parseSessionLine } from '../sessions/reader.js';
import type { JsonObject, SessionEntry } from '../sessions/types.js';

const THINKING_BLOCK_TYPES = new Set(['thinking', 'redacted_thinking']);

function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isThinkingBlock(block: unknown): boolean {
  return isJsonObject(block) && typeof block.type === 'string' && THINKING_BLOCK_TYPES.has(block.type);
}

function stripMessage(message: JsonObject): JsonObject | null {
  let changed = false;
  const next: JsonObject = { ...message };

  if ('thinking' in next) {
    delete next.thinking;
    changed = true;
  }

  const content = next.content;
  if (Array.isArray(content) && content.some(isThinkingBlock)) {
    next.content = content.filter((block) => !isThinkingBlock(block));
    changed = true;
  }

  return changed ? next : null;
}

/**
 * Remove thinking blocks (and bare `thinking` fields) from a record.
 * Records with nothing to strip come back as the same object, raw line intact.
 */
export function stripThinking(entry: SessionEntry): SessionEntry {
  let changed = false;
  const value: JsonObject = { ...entry.value };

  if ('thinking' in value) {
    delete value.thinking;
    changed = true;
  }

  if (isJsonObject(value.message)) {
    const message = stripMessage(value.message);
    if (message) {
      value.message = message;
      changed = true;
    }
  }

  if (!changed) return entry;
  return parseSessionLine(JSON.stringify(value)) ?? entry;
}

export function filterEntries(entries: SessionEntry[], includeThinking: boolean): SessionEntry[] {
  return includeThinking ? entries : entries.map(stripThinking);
}

/**
 * JSONL text for the archive: one record per line, source order, trailing newline.
 */
export function serializeEntries(entries: SessionEntry[]): string {
  return entries.map((entry) => `${entry.raw}\n`).join('');
}

export function hashContent(content: string | Buffer): string {
  return createHash('sha256').update(content).digest('hex');
}
