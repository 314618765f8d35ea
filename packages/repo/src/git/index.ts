import { ProcessRunner, type CommandRunner } from '@configbench/exec';
import { ProcessError } from '@configbench/shared';

export interface GitServiceOptions {
  repoRoot: string;
  runner?: CommandRunner;
  /** Deadline for a single git invocation */
  timeoutMs?: number;
}

export class GitService {
  private repoRoot: string;
  private runner: CommandRunner;
  private timeoutMs: number;

  constructor(options: GitServiceOptions) {
    this.repoRoot = options.repoRoot;
    this.runner = options.runner ?? new ProcessRunner();
    this.timeoutMs = options.timeoutMs ?? 30_000;
  }

  private async exec(args: string[]): Promise<string> {
    const result = await this.runner.run({
      command: 'git',
      args,
      cwd: this.repoRoot,
      timeoutMs: this.timeoutMs,
    });

    if (result.exitCode !== 0) {
      throw new ProcessError(`Git command failed: git ${args.join(' ')}\n${result.stderr}`, {
        exitCode: result.exitCode,
      });
    }
    return result.stdout.trim();
  }

  async getStatusPorcelain(): Promise<string> {
    return this.exec(['status', '--porcelain']);
  }

  async diffToHead(): Promise<string> {
    // Staged and unstaged changes against the last commit.
    return this.exec(['diff', 'HEAD']);
  }

  async diffWorkingTree(): Promise<string> {
    return this.exec(['diff']);
  }

  async untrackedFiles(): Promise<string[]> {
    const status = await this.getStatusPorcelain();
    return status
      .split('\n')
      .filter((line) => line.startsWith('?? '))
      .map((line) => line.slice(3));
  }

  /**
   * Everything the attempt changed relative to the checked-out state. Repositories
   * without a HEAD commit fall back to the plain working-tree diff. New files that
   * were never added are listed after the diff since `git diff` does not show them.
   */
  async attemptDiff(): Promise<string> {
    let diff: string;
    try {
      diff = await this.diffToHead();
    } catch {
      diff = await this.diffWorkingTree();
    }

    const untracked = await this.untrackedFiles();
    if (untracked.length === 0) {
      return diff;
    }
    const listing = `Untracked files:\n${untracked.map((file) => `  ${file}`).join('\n')}`;
    return diff ? `${diff}\n\n${listing}` : listing;
  }
}
