import { writeFileSync } from 'node:fs';
import { join } from 'node:path';

import { Command } from 'commander';
import { afterEach, describe, expect, it, vi } from 'vitest';

import { resolveVaultPaths } from '../../core/config.js';
import { makeWorkspace } from '../../testing/fixtures.js';
import { registerHookCommand } from './hook.js';

afterEach(() => {
  vi.restoreAllMocks();
  vi.unstubAllEnvs();
  process.exitCode = undefined;
});

describe('hook command', () => {
  it('exits 0 when the log directory cannot be created', async () => {
    const ws = makeWorkspace();
    const blocker = join(ws.root, 'blocker');
    writeFileSync(blocker, '');
    const paths = resolveVaultPaths({ TRANSCRIPT_VAULT_HOME: join(blocker, 'home') });
    vi.stubEnv('TRANSCRIPT_VAULT_BIN', '');

    const errors: string[] = [];
    vi.spyOn(console, 'error').mockImplementation((...args: unknown[]) => {
      errors.push(args.map(String).join(' '));
    });

    const program = new Command();
    program.exitOverride();
    registerHookCommand(program, paths);
    await program.parseAsync(['node', 'transcript-vault', 'hook']);

    expect(process.exitCode).toBe(0);
    expect(errors).toHaveLength(2);
    expect(errors.every((line) => line.startsWith(`[hook] cannot write ${paths.logFile}: ENOTDIR`))).toBe(true);
  });

  it('prints the settings snippet', async () => {
    const ws = makeWorkspace();
    const paths = resolveVaultPaths({ TRANSCRIPT_VAULT_HOME: join(ws.root, 'home') });
    const lines: string[] = [];
    vi.spyOn(console, 'log').mockImplementation((...args: unknown[]) => {
      lines.push(args.map(String).join(' '));
    });

    const program = new Command();
    registerHookCommand(program, paths);
    await program.parseAsync(['node', 'transcript-vault', 'hook', '--print-config']);

    expect(JSON.parse(lines[0])).toEqual({
      hooks: { Stop: [{ hooks: [{ type: 'command', command: 'transcript-vault hook' }] }] },
    });
  });
});
