/**
 * transcript-vault - Config Store
 *
 * Machine-specific settings live in <home>/config.json, where <home> is
 * ~/.transcript-vault unless TRANSCRIPT_VAULT_HOME points elsewhere.
 * The file is created by `sync --init`, read on every run and never migrated.
 */

import { readFile, writeFile, mkdir } from 'fs/promises';
import { existsSync } from 'fs';
import path from 'path';
import os from 'os';
import { z } from 'zod';

import { AlreadyInitializedError, ConfigMissingError } from './errors.js';
import { initArchiveRepo, type InitArchiveResult } from './archive-repo.js';
import type { GitRunner } from './git.js';

// ============================================================================
// Types
// ============================================================================

const configSchema = z.object({
  machine_id: z.string().trim().min(1, 'machine_id must be a non-empty string'),
  sync_repo_path: z.string().min(1),
  claude_projects_path: z.string().min(1),
  include_thinking: z.boolean(),
  sync_on_save: z.boolean().default(true),
});

export type VaultConfig = z.infer<typeof configSchema>;

export interface VaultPaths {
  homeDir: string;
  configFile: string;
  logFile: string;
}

// ============================================================================
// Paths
// ============================================================================

export function resolveVaultPaths(
  env: NodeJS.ProcessEnv = process.env,
  homedir: string = os.homedir()
): VaultPaths {
  const override = env.TRANSCRIPT_VAULT_HOME?.trim();
  const homeDir = override ? expandPath(override, homedir) : path.join(homedir, '.transcript-vault');
  return {
    homeDir,
    configFile: path.join(homeDir, 'config.json'),
    logFile: path.join(homeDir, 'sync.log'),
  };
}

export function expandPath(p: string, homedir: string = os.homedir()): string {
  if (p === '~') return homedir;
  if (p.startsWith('~/')) {
    return path.join(homedir, p.slice(2));
  }
  return p;
}

// ============================================================================
// Defaults
// ============================================================================

export function getDefaultConfig(
  paths: VaultPaths,
  machineId: string = os.hostname(),
  homedir: string = os.homedir()
): VaultConfig {
  return {
    machine_id: machineId,
    sync_repo_path: path.join(paths.homeDir, 'repo'),
    claude_projects_path: path.join(homedir, '.claude', 'projects'),
    include_thinking: false, // thinking blocks can be large
    sync_on_save: true,
  };
}

// ============================================================================
// Load / Save
// ============================================================================

export async function loadConfig(paths: VaultPaths, homedir: string = os.homedir()): Promise<VaultConfig> {
  if (!existsSync(paths.configFile)) {
    throw new ConfigMissingError(paths.configFile, 'missing');
  }

  let raw: unknown;
  try {
    raw = JSON.parse(await readFile(paths.configFile, 'utf-8'));
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
      throw new ConfigMissingError(paths.configFile, 'missing');
    }
    throw new ConfigMissingError(paths.configFile, 'invalid', [
      error instanceof Error ? error.message : String(error),
    ]);
  }

  const parsed = configSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) =>
      issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
    );
    throw new ConfigMissingError(paths.configFile, 'invalid', issues);
  }

  return {
    ...parsed.data,
    sync_repo_path: expandPath(parsed.data.sync_repo_path, homedir),
    claude_projects_path: expandPath(parsed.data.claude_projects_path, homedir),
  };
}

export async function saveConfig(paths: VaultPaths, config: VaultConfig): Promise<void> {
  await mkdir(path.dirname(paths.configFile), { recursive: true });
  await writeFile(paths.configFile, JSON.stringify(config, null, 2) + '\n');
}

// ============================================================================
// Init
// ============================================================================

export interface InitOptions {
  machineId?: string;
  remote?: string;
  projectsPath?: string;
  repoPath?: string;
  includeThinking?: boolean;
}

export interface InitResult {
  config: VaultConfig;
  archive: InitArchiveResult;
}

/**
 * Create the config file and an empty archive. Refuses to touch an existing config.
 */
export async function initConfig(
  paths: VaultPaths,
  options: InitOptions,
  git: GitRunner,
  homedir: string = os.homedir()
): Promise<InitResult> {
  if (existsSync(paths.configFile)) {
    throw new AlreadyInitializedError(paths.configFile);
  }

  const defaults = getDefaultConfig(paths, options.machineId?.trim() || os.hostname(), homedir);
  const config: VaultConfig = {
    ...defaults,
    sync_repo_path: options.repoPath ? path.resolve(expandPath(options.repoPath, homedir)) : defaults.sync_repo_path,
    claude_projects_path: options.projectsPath
      ? path.resolve(expandPath(options.projectsPath, homedir))
      : defaults.claude_projects_path,
    include_thinking: options.includeThinking ?? defaults.include_thinking,
  };

  await saveConfig(paths, config);
  const archive = await initArchiveRepo(config.sync_repo_path, git, options.remote);

  return { config, archive };
}
