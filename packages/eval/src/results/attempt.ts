import type { AttemptResult, Issue, Verdict } from '@configbench/shared';

/** Everything known about one attempt apart from its verdict. */
export interface AttemptEvidence {
  configName: string;
  issue: Issue;
  workDir: string;
  output?: string;
  durationMs: number;
  /** Set when the attempt itself (not the evaluation) failed */
  error?: string;
}

/**
 * Builds the immutable result of one attempt, copying the issue's partition
 * tags so the aggregator never needs the issue again.
 */
export function createAttemptResult(evidence: AttemptEvidence, verdict: Verdict): AttemptResult {
  const { issue } = evidence;
  return Object.freeze({
    issueId: issue.id,
    configName: evidence.configName,
    difficulty: issue.difficulty,
    taskType: issue.taskType,
    language: issue.language,
    success: verdict.success,
    score: verdict.score,
    evalDetails: verdict.details,
    durationMs: evidence.durationMs,
    workDir: evidence.workDir,
    ...(evidence.error !== undefined ? { error: evidence.error } : {}),
    ...(evidence.output !== undefined ? { output: evidence.output } : {}),
  });
}
