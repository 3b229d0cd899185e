import { mkdirSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';

import { describe, expect, it } from 'vitest';

import { UnreadableSessionError } from '../core/errors.js';
import { makeWorkspace, writeSession } from '../testing/fixtures.js';
import { collectSessions, parseSessionLine, readSession } from './reader.js';

describe('parseSessionLine', () => {
  it('classifies known record types', () => {
    const user = parseSessionLine('{"type":"user","timestamp":"t","message":{"role":"user","content":"hi"}}');
    expect(user?.kind).toBe('user');
    expect(user?.timestamp).toBe('t');

    const summary = parseSessionLine('{"type":"summary","summary":"Fix the build"}');
    expect(summary).toMatchObject({ kind: 'summary', summary: 'Fix the build' });

    const other = parseSessionLine('{"type":"file-history-snapshot","snapshot":{}}');
    expect(other).toMatchObject({ kind: 'other', type: 'file-history-snapshot' });
  });

  it('keeps the raw line and drops mistyped fields', () => {
    const line = '{"type":"assistant","cwd":42,"message":{"model":"m2","content":[{"type":"text","text":"x"}]}}';
    const entry = parseSessionLine(line);

    expect(entry?.raw).toBe(line);
    expect(entry?.cwd).toBeUndefined();
    expect(entry?.kind === 'assistant' ? entry.message?.model : null).toBe('m2');
  });

  it('returns null for malformed or non-object lines', () => {
    expect(parseSessionLine('{oops')).toBeNull();
    expect(parseSessionLine('[1,2]')).toBeNull();
    expect(parseSessionLine('"text"')).toBeNull();
  });
});

describe('readSession', () => {
  it('counts malformed lines and ignores blank ones', async () => {
    const ws = makeWorkspace();
    const file = writeSession(ws.projects, 'proj', 's1', '{"type":"user"}\r\n\n  \nnope\n{"type":"system"}');

    const result = await readSession(file);

    expect(result.entries.map((entry) => entry.kind)).toEqual(['user', 'system']);
    expect(result.entries[0].raw).toBe('{"type":"user"}');
    expect(result.skippedLines).toBe(1);
    expect(result.size).toBe(43);
  });

  it('throws UnreadableSessionError for a missing file', async () => {
    const ws = makeWorkspace();
    await expect(readSession(join(ws.projects, 'gone.jsonl'))).rejects.toBeInstanceOf(UnreadableSessionError);
  });
});

describe('collectSessions', () => {
  it('lists jsonl files in visible project directories, sorted by session id', async () => {
    const ws = makeWorkspace();
    writeSession(ws.projects, 'zeta', 'a1', '');
    writeSession(ws.projects, 'alpha', 'b2', '');
    writeSession(ws.projects, '.hidden', 'c3', '');
    writeFileSync(join(ws.projects, 'alpha', 'notes.txt'), '');
    writeFileSync(join(ws.projects, 'stray.jsonl'), '');
    mkdirSync(join(ws.projects, 'alpha', 'nested.jsonl'));

    const sessions = await collectSessions(ws.projects);

    expect(sessions).toEqual([
      { sessionId: 'a1', filePath: join(ws.projects, 'zeta', 'a1.jsonl'), projectDir: 'zeta' },
      { sessionId: 'b2', filePath: join(ws.projects, 'alpha', 'b2.jsonl'), projectDir: 'alpha' },
    ]);
  });

  it('returns nothing for a missing root', async () => {
    const ws = makeWorkspace();
    expect(await collectSessions(join(ws.root, 'absent'))).toEqual([]);
  });
});
