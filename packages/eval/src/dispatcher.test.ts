import { SilentLogger, type Verdict } from '@configbench/shared';
import { makeIssue } from './test-helpers';
import { Evaluator, resolveEvalMethod, selectStrategy } from './dispatcher';
import type { EvaluationStrategy, StrategySet } from './strategies';

function stubStrategies(): StrategySet & { calls: string[] } {
  const calls: string[] = [];
  const stub = (method: EvaluationStrategy['method']): EvaluationStrategy => ({
    method,
    evaluate: async () => {
      calls.push(method);
      return { success: true, score: 1, details: method };
    },
  });
  return {
    calls,
    test_suite: stub('test_suite'),
    llm_judge: stub('llm_judge'),
    custom_check: stub('custom_check'),
    hybrid: stub('hybrid'),
  };
}

describe('resolveEvalMethod', () => {
  it.each(['test_suite', 'llm_judge', 'custom_check', 'hybrid'])('keeps %s', (tag) => {
    expect(resolveEvalMethod(tag)).toBe(tag);
  });

  it.each(['snapshot_diff', '', 'TEST_SUITE'])('falls back to llm_judge for %j', (tag) => {
    expect(resolveEvalMethod(tag)).toBe('llm_judge');
  });
});

describe('selectStrategy', () => {
  it('returns the strategy registered for the method', () => {
    const strategies = stubStrategies();
    expect(selectStrategy('custom_check', strategies)).toBe(strategies.custom_check);
    expect(selectStrategy('hybrid', strategies)).toBe(strategies.hybrid);
  });
});

describe('Evaluator', () => {
  it('dispatches on the issue method', async () => {
    const strategies = stubStrategies();
    const evaluator = new Evaluator({ strategies });

    const verdict = await evaluator.evaluate(makeIssue({ evalMethod: 'custom_check' }), '/work', '');

    expect(verdict.details).toBe('custom_check');
    expect(strategies.calls).toEqual(['custom_check']);
  });

  it('uses the judge for unknown methods and warns once', async () => {
    const strategies = stubStrategies();
    const logger = new SilentLogger();
    const warn = vi.spyOn(logger, 'warn');
    const evaluator = new Evaluator({ strategies, logger });

    await evaluator.evaluate(makeIssue({ evalMethod: 'snapshot_diff' }), '/work', '');

    expect(strategies.calls).toEqual(['llm_judge']);
    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn).toHaveBeenCalledWith('Unknown eval method "snapshot_diff" for cache-eviction-001, using llm_judge');
  });

  it('turns a throwing strategy into a zero verdict', async () => {
    const strategies: StrategySet = {
      ...stubStrategies(),
      test_suite: {
        method: 'test_suite',
        evaluate: async (): Promise<Verdict> => {
          throw new Error('disk full');
        },
      },
    };
    const evaluator = new Evaluator({ strategies });

    await expect(evaluator.evaluate(makeIssue(), '/work', '')).resolves.toEqual({
      success: false,
      score: 0,
      details: 'Evaluation error: disk full',
    });
  });

  it('logs an AttemptEvaluated event', async () => {
    const logger = new SilentLogger();
    const log = vi.spyOn(logger, 'log');
    const evaluator = new Evaluator({ strategies: stubStrategies(), logger, corpusName: 'go-issues' });

    await evaluator.evaluate(makeIssue({ evalMethod: 'hybrid' }), '/work', '');

    expect(log).toHaveBeenCalledWith(
      expect.objectContaining({
        type: 'AttemptEvaluated',
        corpusName: 'go-issues',
        payload: expect.objectContaining({ issueId: 'cache-eviction-001', method: 'hybrid', success: true, score: 1 }),
      }),
    );
  });
});
