import {
  ACCEPTANCE_THRESHOLD,
  TimeoutError,
  errorMessage,
  type EvalMethod,
  type Issue,
  type Verdict,
} from '@configbench/shared';

export interface EvaluationContext {
  issue: Issue;
  /** Working tree the coding agent left behind */
  workDir: string;
  /** Transcript the coding agent produced */
  output: string;
  signal?: AbortSignal;
}

/**
 * One way of turning attempt evidence into a Verdict. Implementations resolve
 * for every input: misconfiguration and process failures become failed verdicts.
 */
export interface EvaluationStrategy {
  readonly method: EvalMethod;
  evaluate(ctx: EvaluationContext): Promise<Verdict>;
}

/** Supplies the code changes an attempt made, for the judge prompt. */
export interface DiffProvider {
  diff(workDir: string): Promise<string>;
}

export function clampScore(score: number): number {
  if (Number.isNaN(score)) {
    return 0;
  }
  return Math.min(1, Math.max(0, score));
}

export function makeVerdict(success: boolean, score: number, details: string): Verdict {
  return { success, score: clampScore(score), details };
}

/** Verdict for strategies whose only signal is the score. */
export function thresholdVerdict(score: number, details: string): Verdict {
  const clamped = clampScore(score);
  return makeVerdict(clamped >= ACCEPTANCE_THRESHOLD, clamped, details);
}

export function failedVerdict(details: string): Verdict {
  return makeVerdict(false, 0, details);
}

export function describeRunFailure(what: string, error: unknown): string {
  if (error instanceof TimeoutError) {
    return `${what} timed out after ${error.timeoutMs}ms`;
  }
  return `${what} failed to run: ${errorMessage(error)}`;
}

export function formatPercent(score: number): string {
  return `${Math.round(score * 100)}%`;
}
