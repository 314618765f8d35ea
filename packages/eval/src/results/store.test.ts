import path from 'node:path';
import fs from 'fs-extra';
import { dir, type DirectoryResult } from 'tmp-promise';
import { BENCH_SCHEMA_VERSION, ConfigError, type BenchmarkRun } from '@configbench/shared';
import { makeResult } from '../test-helpers';
import { createConfigSummary, foldResults } from './aggregator';
import { RunStore, deserializeRun, formatRunStamp, serializeRun } from './store';

function sampleRun(): BenchmarkRun {
  const baseline = foldResults(createConfigSummary('baseline'), [
    makeResult({ issueId: 'a', success: true, score: 1, output: 'done' }),
    makeResult({ issueId: 'b', difficulty: 'hard', language: 'python', success: false, score: 0.35 }),
  ]);
  const candidate = foldResults(createConfigSummary('skills-v1'), [
    makeResult({ issueId: 'a', configName: 'skills-v1', success: true, score: 0.9 }),
    makeResult({
      issueId: 'b',
      configName: 'skills-v1',
      difficulty: 'hard',
      language: 'python',
      success: false,
      score: 0.1,
      error: 'agent exited with code 1',
    }),
  ]);
  return {
    schemaVersion: BENCH_SCHEMA_VERSION,
    timestamp: '2026-03-01T10:00:00.000Z',
    corpusName: 'go-issues',
    corpusVersion: '1.2.0',
    durationMs: 93000,
    configs: { baseline, 'skills-v1': candidate },
  };
}

describe('serializeRun / deserializeRun', () => {
  it('round-trips a run', () => {
    const run = sampleRun();
    expect(deserializeRun(serializeRun(run))).toEqual(run);
  });

  it('rejects malformed JSON with a ConfigError', () => {
    expect(() => deserializeRun('{"schemaVersion": 1,')).toThrow(ConfigError);
    expect(() => deserializeRun('{"schemaVersion": 1,')).toThrow(/^Invalid benchmark run: /);
  });

  it('rejects runs of another schema version', () => {
    const json = JSON.stringify({ ...sampleRun(), schemaVersion: 2 });
    expect(() => deserializeRun(json)).toThrow(/schemaVersion: Invalid literal value/);
  });

  it('names missing fields', () => {
    const { corpusName: _omitted, ...rest } = sampleRun();
    expect(() => deserializeRun(JSON.stringify(rest), 'run.json')).toThrow('Invalid run.json:\ncorpusName: Required');
  });
});

describe('formatRunStamp', () => {
  it('formats in UTC', () => {
    expect(formatRunStamp('2026-03-01T10:00:05.000Z')).toBe('20260301-100005');
    expect(formatRunStamp('2026-03-01T23:30:00-02:00')).toBe('20260302-013000');
  });
});

describe('RunStore', () => {
  let workspace: DirectoryResult;
  let store: RunStore;

  beforeEach(async () => {
    workspace = await dir({ unsafeCleanup: true });
    store = new RunStore(workspace.path);
  });

  afterEach(async () => {
    await workspace.cleanup();
  });

  it('saves a run under a timestamped name and loads it back', async () => {
    const run = sampleRun();
    const filePath = await store.saveRun(run);

    expect(filePath).toBe(path.join(workspace.path, 'benchmark_20260301-100000.json'));
    await expect(store.loadRun(filePath)).resolves.toEqual(run);
  });

  it('redacts secrets in saved files', async () => {
    const run = sampleRun();
    run.configs.baseline.results[0] = makeResult({ output: 'export ANTHROPIC_API_KEY=test-secret-value' });

    const loaded = await store.loadRun(await store.saveRun(run));

    expect(loaded.configs.baseline.results[0].output).toBe('export ANTHROPIC_API_KEY=[REDACTED]');
  });

  it('saves attempts under issues/ with file-safe names', async () => {
    const result = makeResult({ configName: 'skills/v1', issueId: 'cache-eviction-001' });
    const filePath = await store.saveAttempt(result);

    expect(filePath).toBe(path.join(workspace.path, 'issues', 'skills_v1_cache-eviction-001.json'));
    expect(await fs.readJson(filePath)).toEqual(result);
  });

  it('reports a missing run file as a ConfigError', async () => {
    const missing = path.join(workspace.path, 'nope.json');
    await expect(store.loadRun(missing)).rejects.toThrow(`Could not read benchmark run ${missing}: ENOENT`);
  });
});
