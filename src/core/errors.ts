/**
 * transcript-vault - Error Taxonomy
 *
 * Every failure the CLI reports on purpose is a VaultError with a stable code.
 * Anything else reaching a command handler is a bug and is printed as-is.
 */

export type VaultErrorCode =
  | 'CONFIG_MISSING'
  | 'ALREADY_INITIALIZED'
  | 'UNREADABLE_SESSION'
  | 'DUPLICATE_SESSION'
  | 'PUBLISH_ERROR'
  | 'ARCHIVE_MISSING';

export class VaultError extends Error {
  readonly code: VaultErrorCode;

  constructor(code: VaultErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class ConfigMissingError extends VaultError {
  readonly reason: 'missing' | 'invalid';
  readonly configPath: string;
  readonly issues: string[];

  constructor(configPath: string, reason: 'missing' | 'invalid', issues: string[] = []) {
    const detail = reason === 'missing'
      ? `No config found at ${configPath}. Run "transcript-vault sync --init" first.`
      : `Invalid config at ${configPath}${issues.length > 0 ? `: ${issues.join('; ')}` : ''}`;
    super('CONFIG_MISSING', detail);
    this.reason = reason;
    this.configPath = configPath;
    this.issues = issues;
  }
}

export class AlreadyInitializedError extends VaultError {
  readonly configPath: string;

  constructor(configPath: string) {
    super('ALREADY_INITIALIZED', `Already initialized: config exists at ${configPath}`);
    this.configPath = configPath;
  }
}

export class UnreadableSessionError extends VaultError {
  readonly sessionPath: string;

  constructor(sessionPath: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super('UNREADABLE_SESSION', `Cannot read session ${sessionPath}: ${reason}`, { cause });
    this.sessionPath = sessionPath;
  }
}

/**
 * Two project directories hold a session file with the same id. Only the first
 * (by path) is archived; both would otherwise share one archive slot.
 */
export class DuplicateSessionError extends VaultError {
  readonly sessionPath: string;
  readonly otherPath: string;

  constructor(sessionId: string, sessionPath: string, otherPath: string) {
    super('DUPLICATE_SESSION', `Duplicate session id ${sessionId}, also at ${otherPath}`);
    this.sessionPath = sessionPath;
    this.otherPath = otherPath;
  }
}

export type PublishStage = 'stage' | 'commit' | 'push';

export class PublishError extends VaultError {
  readonly stage: PublishStage;
  readonly stderr: string;

  constructor(stage: PublishStage, stderr: string) {
    super('PUBLISH_ERROR', `git ${stage} failed: ${stderr.trim() || 'unknown error'}`);
    this.stage = stage;
    this.stderr = stderr;
  }
}

export class ArchiveMissingError extends VaultError {
  readonly archivePath: string;

  constructor(archivePath: string) {
    super('ARCHIVE_MISSING', `Archive not found at ${archivePath}. Run "transcript-vault sync --init" first.`);
    this.archivePath = archivePath;
  }
}

export function isVaultError(error: unknown): error is VaultError {
  return error instanceof VaultError;
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
