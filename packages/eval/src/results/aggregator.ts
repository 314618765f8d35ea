import type { AttemptResult, ConfigSummary, PartitionStats } from '@configbench/shared';

export function createConfigSummary(configName: string): ConfigSummary {
  return {
    configName,
    results: [],
    total: 0,
    successCount: 0,
    successRate: 0,
    averageScore: 0,
    totalDurationMs: 0,
    byDifficulty: {},
    byTaskType: {},
    byLanguage: {},
  };
}

function rate(successes: number, total: number): number {
  return total === 0 ? 0 : successes / total;
}

// `n` already counts the new value.
function runningMean(previousMean: number, n: number, value: number): number {
  return (previousMean * (n - 1) + value) / n;
}

function foldPartition(stats: PartitionStats | undefined, result: AttemptResult): PartitionStats {
  const total = (stats?.total ?? 0) + 1;
  const successes = (stats?.successes ?? 0) + (result.success ? 1 : 0);
  return {
    total,
    successes,
    successRate: rate(successes, total),
    avgScore: runningMean(stats?.avgScore ?? 0, total, result.score),
  };
}

function withPartition<K extends string>(
  partitions: Partial<Record<K, PartitionStats>>,
  key: K,
  result: AttemptResult,
): Partial<Record<K, PartitionStats>> {
  const next: Partial<Record<K, PartitionStats>> = { ...partitions };
  next[key] = foldPartition(partitions[key], result);
  return next;
}

/**
 * Returns a new summary with `result` counted in. The input summary is left as
 * it was, so a fold can be retried or discarded freely.
 */
export function foldResult(summary: ConfigSummary, result: AttemptResult): ConfigSummary {
  const total = summary.total + 1;
  const successCount = summary.successCount + (result.success ? 1 : 0);

  return {
    ...summary,
    results: [...summary.results, result],
    total,
    successCount,
    successRate: rate(successCount, total),
    averageScore: runningMean(summary.averageScore, total, result.score),
    totalDurationMs: summary.totalDurationMs + result.durationMs,
    byDifficulty: withPartition(summary.byDifficulty, result.difficulty, result),
    byTaskType: withPartition(summary.byTaskType, result.taskType, result),
    byLanguage: {
      ...summary.byLanguage,
      [result.language]: foldPartition(summary.byLanguage[result.language], result),
    },
  };
}

export function foldResults(summary: ConfigSummary, results: readonly AttemptResult[]): ConfigSummary {
  return results.reduce(foldResult, summary);
}
