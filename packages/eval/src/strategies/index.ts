import { ProcessRunner, type CommandRunner } from '@configbench/exec';
import { DEFAULT_CONFIG, SilentLogger, type BenchConfig, type EvalMethod, type Logger } from '@configbench/shared';
import { CustomCheckStrategy } from './custom_check';
import { GitDiffProvider } from './git_diff';
import { HybridStrategy } from './hybrid';
import { LlmJudgeStrategy } from './llm_judge';
import { TestSuiteStrategy } from './test_suite';
import type { DiffProvider, EvaluationStrategy } from './types';

export type StrategySet = { readonly [M in EvalMethod]: EvaluationStrategy };

export interface StrategyDependencies {
  runner?: CommandRunner;
  diffProvider?: DiffProvider;
  config?: BenchConfig;
  logger?: Logger;
}

export function createStrategySet(deps: StrategyDependencies = {}): StrategySet {
  const runner = deps.runner ?? new ProcessRunner();
  const config = deps.config ?? DEFAULT_CONFIG;
  const logger = deps.logger ?? new SilentLogger();

  const testSuite = new TestSuiteStrategy({ runner, config: config.testSuite });
  const llmJudge = new LlmJudgeStrategy({
    runner,
    diffProvider: deps.diffProvider ?? new GitDiffProvider(runner),
    config: config.judge,
    logger,
  });

  return {
    test_suite: testSuite,
    llm_judge: llmJudge,
    custom_check: new CustomCheckStrategy({ runner, config: config.customCheck, logger }),
    hybrid: new HybridStrategy(testSuite, llmJudge),
  };
}

export * from './types';
export * from './test_output';
export * from './judge_response';
export * from './test_suite';
export * from './llm_judge';
export * from './custom_check';
export * from './hybrid';
export * from './git_diff';
