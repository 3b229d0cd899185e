/**
 * Best-effort desktop notification for a failed background sync.
 */

import { spawnSync } from 'child_process';

export interface NotifyCommand {
  command: string;
  args: string[];
}

export interface NotifyDeps {
  platform: NodeJS.Platform;
  /** Returns the exit status of a command, or null when it could not run. */
  run: (command: string, args: string[]) => number | null;
}

const TITLE = 'transcript-vault';

function appleScriptString(s: string): string {
  return `"${s.replace(/\\/g, '\\\\').replace(/"/g, '\\"')}"`;
}

export function buildNotifyCommand(
  platform: NodeJS.Platform,
  message: string,
  hasNotifySend: boolean
): NotifyCommand | null {
  if (platform === 'darwin') {
    return {
      command: 'osascript',
      args: ['-e', `display notification ${appleScriptString(message)} with title ${appleScriptString(TITLE)}`],
    };
  }
  if (hasNotifySend) {
    return { command: 'notify-send', args: [TITLE, message] };
  }
  return null;
}

export const defaultNotifyDeps: NotifyDeps = {
  platform: process.platform,
  run: (command, args) => spawnSync(command, args, { stdio: 'ignore', timeout: 5000 }).status,
};

/**
 * Returns true when a notification command ran successfully.
 */
export function notifyFailure(message: string, deps: NotifyDeps = defaultNotifyDeps): boolean {
  try {
    const hasNotifySend = deps.platform !== 'darwin' && deps.run('which', ['notify-send']) === 0;
    const cmd = buildNotifyCommand(deps.platform, message, hasNotifySend);
    if (!cmd) return false;
    return deps.run(cmd.command, cmd.args) === 0;
  } catch {
    // no notifier available; the log file still has the failure
    return false;
  }
}
