import { BENCH_SCHEMA_VERSION, type BenchmarkRun } from '@configbench/shared';
import { makeIssue, makeResult } from './test-helpers';
import { ReportRenderer, formatDelta, formatDuration } from './renderer';
import { formatPercent } from './strategies';
import { createConfigSummary, foldResults } from './results';

function sampleRun(): BenchmarkRun {
  const baseline = foldResults(createConfigSummary('baseline'), [
    makeResult({ difficulty: 'easy', success: true, score: 1, durationMs: 1000 }),
    makeResult({ difficulty: 'medium', success: false, score: 0.4, durationMs: 2000 }),
  ]);
  const candidate = foldResults(createConfigSummary('skills-with-a-very-long-name'), [
    makeResult({ difficulty: 'easy', success: true, score: 1, durationMs: 30000 }),
    makeResult({ difficulty: 'medium', success: true, score: 0.8, durationMs: 63000 }),
  ]);
  return {
    schemaVersion: BENCH_SCHEMA_VERSION,
    timestamp: '2026-03-01T10:00:00.000Z',
    corpusName: 'go-issues',
    corpusVersion: '1.2.0',
    durationMs: 99000,
    configs: { 'skills-with-a-very-long-name': candidate, baseline },
  };
}

describe('formatting helpers', () => {
  it('formats percentages, deltas and durations', () => {
    expect(formatPercent(0.736)).toBe('74%');
    expect(formatDelta(19.0)).toBe('+19.0');
    expect(formatDelta(-3.5)).toBe('-3.5');
    expect(formatDelta(0)).toBe('+0.0');
    expect(formatDuration(0)).toBe('0s');
    expect(formatDuration(93000)).toBe('1m33s');
    expect(formatDuration(3723000)).toBe('1h2m3s');
  });
});

describe('ReportRenderer', () => {
  const renderer = new ReportRenderer({ color: false });

  it('renders the full report without colour', () => {
    const lines = renderer.render(sampleRun()).split('\n');

    expect(lines).toEqual([
      '='.repeat(61),
      'BENCHMARK REPORT: go-issues',
      'Version: 1.2.0 | Run: 2026-03-01 10:00 | Duration: 1m39s',
      '='.repeat(61),
      '',
      '## Summary by Configuration',
      '',
      'Config                Success    Score   Duration',
      '-'.repeat(50),
      'baseline                  50%      70%         3s',
      'skills-with-a-ver...     100%      90%      1m33s',
      '',
      '## Success Rate by Difficulty',
      '',
      'Config                     Easy     Medium       Hard',
      '-'.repeat(53),
      'baseline                   100%         0%          -',
      'skills-with-a-ver...       100%       100%          -',
      '',
      '## Improvement vs Baseline',
      '',
      '  skills-with-a-very-long-name: +50.0 percentage points (significant)',
      '',
    ]);
  });

  it('leaves out the comparison without a baseline', () => {
    const run = sampleRun();
    const { baseline: _dropped, ...configs } = run.configs;
    const report = renderer.render({ ...run, configs });
    expect(report).not.toContain('## Improvement vs Baseline');
  });

  it('keeps the comparison header when the baseline is the only configuration', () => {
    const run = sampleRun();
    const report = renderer.render({ ...run, configs: { baseline: run.configs.baseline } });
    expect(report.split('\n').slice(-3)).toEqual(['## Improvement vs Baseline', '', '']);
  });

  it('writes progress lines to the sink', () => {
    const lines: string[] = [];
    const progress = new ReportRenderer({ color: false, write: (line) => lines.push(line) });

    progress.logAttemptStarted('baseline', makeIssue(), 0, 4);
    progress.logAttemptFinished(makeResult({ success: false, score: 0.25, durationMs: 1500, error: 'agent crashed' }));

    expect(lines).toEqual([
      '(1/4) [baseline] Starting issue: cache-eviction-001 - Fix LRU eviction order',
      '  [baseline] Finished issue: cache-eviction-001 in 2s. Status: ERROR (score 25%)',
      '    Error: agent crashed',
    ]);
  });
});
