import {
  BENCH_EVENT_SCHEMA_VERSION,
  SilentLogger,
  UsageError,
  errorMessage,
  type EvalMethod,
  type Issue,
  type Logger,
  type Verdict,
} from '@configbench/shared';
import { failedVerdict, type StrategySet } from './strategies';

/**
 * Maps a corpus tag onto a known method. Unknown tags get the judged assessment.
 */
export function resolveEvalMethod(tag: string): EvalMethod {
  switch (tag) {
    case 'test_suite':
    case 'llm_judge':
    case 'custom_check':
    case 'hybrid':
      return tag;
    default:
      return 'llm_judge';
  }
}

export function selectStrategy(method: EvalMethod, strategies: StrategySet) {
  switch (method) {
    case 'test_suite':
      return strategies.test_suite;
    case 'llm_judge':
      return strategies.llm_judge;
    case 'custom_check':
      return strategies.custom_check;
    case 'hybrid':
      return strategies.hybrid;
    default: {
      const unknownMethod: never = method;
      throw new UsageError(`Unsupported evaluation method: ${String(unknownMethod)}`);
    }
  }
}

export interface EvaluatorOptions {
  strategies: StrategySet;
  logger?: Logger;
  /** Stamped on emitted events */
  corpusName?: string;
}

export class Evaluator {
  private strategies: StrategySet;
  private logger: Logger;
  private corpusName: string;

  constructor(options: EvaluatorOptions) {
    this.strategies = options.strategies;
    this.logger = options.logger ?? new SilentLogger();
    this.corpusName = options.corpusName ?? 'unknown';
  }

  /**
   * Produces a verdict for one attempt. Never rejects: a strategy that throws
   * yields a zero-score verdict carrying the error message.
   */
  async evaluate(issue: Issue, workDir: string, output: string, signal?: AbortSignal): Promise<Verdict> {
    const method = resolveEvalMethod(issue.evalMethod);
    if (method !== issue.evalMethod) {
      await this.logger.warn(`Unknown eval method "${issue.evalMethod}" for ${issue.id}, using ${method}`);
    }

    const startedAt = Date.now();
    let verdict: Verdict;
    try {
      verdict = await selectStrategy(method, this.strategies).evaluate({ issue, workDir, output, signal });
    } catch (error: unknown) {
      await this.logger.error(
        error instanceof Error ? error : new Error(String(error)),
        `Evaluation of ${issue.id} failed`,
      );
      verdict = failedVerdict(`Evaluation error: ${errorMessage(error)}`);
    }

    await this.logger.log({
      schemaVersion: BENCH_EVENT_SCHEMA_VERSION,
      timestamp: new Date().toISOString(),
      corpusName: this.corpusName,
      type: 'AttemptEvaluated',
      payload: {
        issueId: issue.id,
        method,
        success: verdict.success,
        score: verdict.score,
        durationMs: Date.now() - startedAt,
      },
    });

    return verdict;
  }
}
