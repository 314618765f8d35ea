import path from 'node:path';
import fs from 'fs-extra';
import type { CommandRunner, ProcessRunResult } from '@configbench/exec';
import {
  DEFAULT_CONFIG,
  SilentLogger,
  errorMessage,
  type CustomCheckConfig,
  type Logger,
  type Verdict,
} from '@configbench/shared';
import {
  describeRunFailure,
  failedVerdict,
  makeVerdict,
  type EvaluationContext,
  type EvaluationStrategy,
} from './types';

export interface CustomCheckStrategyOptions {
  runner: CommandRunner;
  config?: CustomCheckConfig;
  logger?: Logger;
}

/**
 * Runs the issue's own check script in the working tree. The script file only
 * exists for the duration of the run.
 */
export class CustomCheckStrategy implements EvaluationStrategy {
  readonly method = 'custom_check';
  private runner: CommandRunner;
  private config: CustomCheckConfig;
  private logger: Logger;

  constructor(options: CustomCheckStrategyOptions) {
    this.runner = options.runner;
    this.config = options.config ?? DEFAULT_CONFIG.customCheck;
    this.logger = options.logger ?? new SilentLogger();
  }

  async evaluate(ctx: EvaluationContext): Promise<Verdict> {
    const script = ctx.issue.checkScript;
    if (script === undefined || script.trim() === '') {
      return failedVerdict('No check script specified');
    }

    const scriptPath = path.join(ctx.workDir, this.config.scriptName);
    try {
      await fs.writeFile(scriptPath, script, { mode: 0o755 });
      await fs.chmod(scriptPath, 0o755);
    } catch (error: unknown) {
      await this.removeScript(scriptPath);
      return failedVerdict(`Failed to write check script: ${errorMessage(error)}`);
    }

    let result: ProcessRunResult;
    try {
      result = await this.runner.run({
        command: this.config.shell,
        args: [scriptPath],
        cwd: ctx.workDir,
        timeoutMs: this.config.timeoutMs,
        signal: ctx.signal,
      });
    } catch (error: unknown) {
      return failedVerdict(describeRunFailure('Check script', error));
    } finally {
      await this.removeScript(scriptPath);
    }

    if (result.exitCode === 0) {
      return makeVerdict(true, 1, result.stdout);
    }
    return makeVerdict(false, 0, `Check failed with exit code ${result.exitCode}\n${result.stderr}`);
  }

  private async removeScript(scriptPath: string): Promise<void> {
    try {
      await fs.remove(scriptPath);
    } catch (error: unknown) {
      await this.logger.warn(`Could not remove check script ${scriptPath}: ${errorMessage(error)}`);
    }
  }
}
