import { describe, expect, it } from 'vitest';

import { parseSessionLine } from '../sessions/reader.js';
import type { SessionEntry } from '../sessions/types.js';
import { filterEntries, hashContent, serializeEntries, stripThinking } from './filter.js';

function entry(record: unknown): SessionEntry {
  const parsed = parseSessionLine(JSON.stringify(record));
  if (!parsed) throw new Error('fixture record did not parse');
  return parsed;
}

describe('stripThinking', () => {
  it('removes thinking and redacted_thinking blocks', () => {
    const stripped = stripThinking(
      entry({
        type: 'assistant',
        message: {
          role: 'assistant',
          content: [
            { type: 'thinking', thinking: 'hmm' },
            { type: 'redacted_thinking', data: 'xyz' },
            { type: 'text', text: 'answer' },
          ],
        },
      })
    );

    expect(stripped.raw).toBe('{"type":"assistant","message":{"role":"assistant","content":[{"type":"text","text":"answer"}]}}');
    expect(stripped.kind).toBe('assistant');
  });

  it('removes bare thinking fields at both levels', () => {
    const stripped = stripThinking(
      entry({ type: 'assistant', thinking: 'top', message: { role: 'assistant', thinking: 'inner', content: 'ok' } })
    );
    expect(stripped.raw).toBe('{"type":"assistant","message":{"role":"assistant","content":"ok"}}');
  });

  it('returns records without thinking unchanged', () => {
    const line = '{ "type": "user",  "message": {"content": "spacing kept"} }';
    const original = parseSessionLine(line);
    expect(original).not.toBeNull();
    if (!original) return;
    expect(stripThinking(original)).toBe(original);
  });
});

describe('large integers', () => {
  it('survive untouched in records without thinking', () => {
    const line = '{"type":"user","seq":12345678901234567890}';
    const parsed = parseSessionLine(line);
    expect(parsed).not.toBeNull();
    if (!parsed) return;
    expect(filterEntries([parsed], false)[0].raw).toBe(line);
  });

  it('are rounded in records that had thinking removed', () => {
    const stripped = stripThinking(
      parseSessionLine('{"type":"assistant","seq":12345678901234567890,"thinking":"x"}') ?? entry({ type: 'none' })
    );
    expect(stripped.raw).toBe('{"type":"assistant","seq":12345678901234567000}');
  });
});

describe('filterEntries', () => {
  it('passes entries through when thinking is included', () => {
    const entries = [entry({ type: 'assistant', message: { content: [{ type: 'thinking', thinking: 'x' }] } })];
    expect(filterEntries(entries, true)).toBe(entries);
    expect(filterEntries(entries, false)[0].raw).toBe('{"type":"assistant","message":{"content":[]}}');
  });
});

describe('serializeEntries', () => {
  it('writes one line per entry with a trailing newline', () => {
    expect(serializeEntries([entry({ type: 'a' }), entry({ type: 'b' })])).toBe('{"type":"a"}\n{"type":"b"}\n');
    expect(serializeEntries([])).toBe('');
  });
});

describe('hashContent', () => {
  it('hashes strings and buffers alike', () => {
    expect(hashContent('')).toBe('e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855');
    expect(hashContent(Buffer.from('abc'))).toBe(hashContent('abc'));
  });
});
