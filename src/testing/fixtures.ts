import { mkdirSync, mkdtempSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import type { VaultConfig } from '../core/config.js';

export interface Workspace {
  root: string;
  projects: string;
  archive: string;
  config: VaultConfig;
}

export function makeWorkspace(prefix = 'tv-test-'): Workspace {
  const root = mkdtempSync(join(tmpdir(), prefix));
  const projects = join(root, 'projects');
  const archive = join(root, 'archive');
  mkdirSync(projects, { recursive: true });
  mkdirSync(archive, { recursive: true });
  return {
    root,
    projects,
    archive,
    config: {
      machine_id: 'host1',
      sync_repo_path: archive,
      claude_projects_path: projects,
      include_thinking: false,
      sync_on_save: true,
    },
  };
}

export function sessionText(records: unknown[]): string {
  return records.map((record) => `${JSON.stringify(record)}\n`).join('');
}

export function writeSession(projects: string, projectDir: string, sessionId: string, content: string): string {
  const dir = join(projects, projectDir);
  mkdirSync(dir, { recursive: true });
  const filePath = join(dir, `${sessionId}.jsonl`);
  writeFileSync(filePath, content);
  return filePath;
}

export const T0 = '2025-03-01T10:00:00.000Z';
export const T1 = '2025-03-01T10:00:05.000Z';
export const T2 = '2025-03-01T10:01:00.000Z';

export function threeRecordSession(): unknown[] {
  return [
    {
      type: 'user',
      sessionId: 'abc123',
      timestamp: T0,
      cwd: '/workspace/app',
      gitBranch: 'main',
      message: { role: 'user', content: 'hi' },
    },
    {
      type: 'assistant',
      sessionId: 'abc123',
      timestamp: T1,
      message: { role: 'assistant', model: 'm1', content: [{ type: 'text', text: 'hello' }] },
    },
    {
      type: 'user',
      sessionId: 'abc123',
      timestamp: T2,
      message: { role: 'user', content: 'bye' },
    },
  ];
}
