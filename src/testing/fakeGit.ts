import type { GitCommandResult, GitRunner } from '../core/git.js';

export type GitHandler = (args: string[], cwd: string) => Partial<GitCommandResult> | undefined;

/**
 * In-process GitRunner: records every call and answers from a handler.
 * Unhandled commands succeed with empty output.
 */
export class FakeGit implements GitRunner {
  readonly calls: Array<{ args: string[]; cwd: string }> = [];

  constructor(private readonly handler: GitHandler = () => undefined) {}

  async run(args: string[], cwd: string): Promise<GitCommandResult> {
    this.calls.push({ args: [...args], cwd });
    const result = this.handler(args, cwd) ?? {};
    return {
      stdout: result.stdout ?? '',
      stderr: result.stderr ?? '',
      exitCode: result.exitCode ?? 0,
    };
  }

  commands(): string[] {
    return this.calls.map((call) => call.args.join(' '));
  }
}
