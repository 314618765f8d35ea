import type { CommandRunner, ProcessRunRequest, ProcessRunResult } from '@configbench/exec';
import {
  DEFAULT_CONFIG,
  SilentLogger,
  errorMessage,
  truncateOutput,
  type JudgeConfig,
  type Logger,
  type Verdict,
} from '@configbench/shared';
import { buildJudgePrompt, parseJudgeResponse } from './judge_response';
import {
  describeRunFailure,
  failedVerdict,
  thresholdVerdict,
  type DiffProvider,
  type EvaluationContext,
  type EvaluationStrategy,
} from './types';

export interface LlmJudgeStrategyOptions {
  runner: CommandRunner;
  diffProvider: DiffProvider;
  config?: JudgeConfig;
  logger?: Logger;
}

/**
 * Asks an external model to grade the attempt from its diff and transcript.
 */
export class LlmJudgeStrategy implements EvaluationStrategy {
  readonly method = 'llm_judge';
  private runner: CommandRunner;
  private diffProvider: DiffProvider;
  private config: JudgeConfig;
  private logger: Logger;

  constructor(options: LlmJudgeStrategyOptions) {
    this.runner = options.runner;
    this.diffProvider = options.diffProvider;
    this.config = options.config ?? DEFAULT_CONFIG.judge;
    this.logger = options.logger ?? new SilentLogger();
  }

  async evaluate(ctx: EvaluationContext): Promise<Verdict> {
    const diff = await this.collectDiff(ctx.workDir);
    const prompt = buildJudgePrompt(ctx.issue, diff, ctx.output);

    let result: ProcessRunResult;
    try {
      result = await this.runner.run(this.buildRequest(prompt, ctx));
    } catch (error: unknown) {
      return failedVerdict(describeRunFailure('LLM judge', error));
    }

    if (result.exitCode !== 0) {
      const stderr = result.stderr.trim();
      return failedVerdict(
        `LLM judge exited with code ${result.exitCode}` +
          (stderr ? `: ${truncateOutput(stderr, 200)}` : ''),
      );
    }

    const { score, reason } = parseJudgeResponse(result.stdout);
    return thresholdVerdict(score, reason);
  }

  private buildRequest(prompt: string, ctx: EvaluationContext): ProcessRunRequest {
    const base = {
      command: this.config.command,
      cwd: ctx.workDir,
      timeoutMs: this.config.timeoutMs,
      signal: ctx.signal,
    };
    if (this.config.promptVia === 'stdin') {
      return { ...base, args: [...this.config.args], input: prompt };
    }
    return { ...base, args: [...this.config.args, prompt] };
  }

  private async collectDiff(workDir: string): Promise<string> {
    try {
      return await this.diffProvider.diff(workDir);
    } catch (error: unknown) {
      // The judge still sees the transcript.
      await this.logger.warn(`Could not collect diff in ${workDir}: ${errorMessage(error)}`);
      return '';
    }
  }
}
