import type { CommandRunner } from '@configbench/exec';
import { GitService } from '@configbench/repo';
import type { DiffProvider } from './types';

export class GitDiffProvider implements DiffProvider {
  constructor(private readonly runner?: CommandRunner) {}

  diff(workDir: string): Promise<string> {
    return new GitService({ repoRoot: workDir, runner: this.runner }).attemptDiff();
  }
}
