import { describe, expect, it } from 'vitest';

import { tailLines } from './logs.js';

describe('tailLines', () => {
  const content = '[2025-01-01 00:00:00] INFO  one\n[2025-01-01 00:00:01] INFO  two\n\n[2025-01-01 00:00:02] ERROR three\n';

  it('returns the last n non-empty lines', () => {
    expect(tailLines(content, 2)).toEqual(['[2025-01-01 00:00:01] INFO  two', '[2025-01-01 00:00:02] ERROR three']);
  });

  it('returns everything when n exceeds the line count', () => {
    expect(tailLines(content, 10)).toHaveLength(3);
  });

  it('returns nothing for n of zero', () => {
    expect(tailLines(content, 0)).toEqual([]);
  });
});
