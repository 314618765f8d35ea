import {
  SIGNIFICANCE_THRESHOLD_POINTS,
  type BenchmarkRun,
  type Comparison,
  type ConfigSummary,
} from '@configbench/shared';

/** Configuration the report compares every other configuration against */
export const BASELINE_CONFIG = 'baseline';

export type ComparisonOutcome =
  | { comparable: true; comparison: Comparison }
  | { comparable: false; missing: string[] };

function findConfig(run: BenchmarkRun, name: string): ConfigSummary | undefined {
  return Object.hasOwn(run.configs, name) ? run.configs[name] : undefined;
}

export function computeComparison(
  baselineConfig: string,
  candidateConfig: string,
  baselineRate: number,
  candidateRate: number,
): Comparison {
  const delta = (candidateRate - baselineRate) * 100;
  return {
    baselineConfig,
    candidateConfig,
    baselineRate,
    candidateRate,
    delta,
    significant: Math.abs(delta) >= SIGNIFICANCE_THRESHOLD_POINTS,
  };
}

/**
 * Compares two configurations of a run by success rate. Names absent from the
 * run are reported instead of being scored as zero.
 */
export function compareConfigs(
  run: BenchmarkRun,
  baselineName: string,
  candidateName: string,
): ComparisonOutcome {
  const baseline = findConfig(run, baselineName);
  const candidate = findConfig(run, candidateName);
  if (baseline === undefined || candidate === undefined) {
    const missing = [baselineName, candidateName].filter((name) => findConfig(run, name) === undefined);
    return { comparable: false, missing: Array.from(new Set(missing)) };
  }

  return {
    comparable: true,
    comparison: computeComparison(baselineName, candidateName, baseline.successRate, candidate.successRate),
  };
}

export function compareAllToBaseline(run: BenchmarkRun, baselineName = BASELINE_CONFIG): Comparison[] {
  const baseline = findConfig(run, baselineName);
  if (baseline === undefined) {
    return [];
  }

  return Object.entries(run.configs)
    .filter(([name]) => name !== baselineName)
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([name, summary]) =>
      computeComparison(baselineName, name, baseline.successRate, summary.successRate),
    );
}
