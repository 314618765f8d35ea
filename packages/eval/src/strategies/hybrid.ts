import type { Verdict } from '@configbench/shared';
import { formatPercent, thresholdVerdict, type EvaluationContext, type EvaluationStrategy } from './types';

export const HYBRID_TEST_WEIGHT = 0.6;
export const HYBRID_JUDGE_WEIGHT = 0.4;

/**
 * Weighted blend of the test-suite and judge verdicts. The two run one after
 * the other since both may touch the same working tree.
 */
export class HybridStrategy implements EvaluationStrategy {
  readonly method = 'hybrid';

  constructor(
    private readonly tests: EvaluationStrategy,
    private readonly judge: EvaluationStrategy,
  ) {}

  async evaluate(ctx: EvaluationContext): Promise<Verdict> {
    const testVerdict = await this.tests.evaluate(ctx);
    const judgeVerdict = await this.judge.evaluate(ctx);

    const combined = testVerdict.score * HYBRID_TEST_WEIGHT + judgeVerdict.score * HYBRID_JUDGE_WEIGHT;
    return thresholdVerdict(
      combined,
      `Test score: ${formatPercent(testVerdict.score)}, Judge score: ${formatPercent(judgeVerdict.score)}\n` +
        `Tests: ${testVerdict.details}\n` +
        `Judge: ${judgeVerdict.details}`,
    );
  }
}
