import path from 'node:path';
import fs from 'fs-extra';
import { dir, type DirectoryResult } from 'tmp-promise';
import { BenchConfigSchema, JsonlLogger } from '@configbench/shared';
import { fakeRunner, makeIssue } from './test-helpers';
import { createBenchmarkSession } from './bench';

describe('createBenchmarkSession', () => {
  let workspace: DirectoryResult;

  beforeEach(async () => {
    workspace = await dir({ unsafeCleanup: true });
  });

  afterEach(async () => {
    await workspace.cleanup();
  });

  it('runs configured commands and writes into the configured output dir', async () => {
    const config = BenchConfigSchema.parse({
      judge: { command: 'judge-bin', args: [] },
      testSuite: { defaultCommands: { go: 'gotestsum' } },
      output: { dir: 'results', eventLogPath: 'logs/events.jsonl' },
    });
    const { runner, requests } = fakeRunner((request) =>
      request.command === 'judge-bin' ? { stdout: 'SCORE: 90\nREASON: fine' } : {},
    );
    const session = createBenchmarkSession({
      config,
      corpus: { name: 'go-issues', version: '1' },
      cwd: workspace.path,
      runner,
      diffProvider: { diff: async () => '' },
      color: false,
      write: () => {},
    });

    expect(session.logger).toBeInstanceOf(JsonlLogger);

    await session.recorder.record({
      configName: 'baseline',
      issue: makeIssue({ evalMethod: 'hybrid' }),
      workDir: workspace.path,
      output: '',
      durationMs: 10,
    });
    const run = await session.recorder.finish();

    expect(requests.map((r) => r.command)).toEqual(['gotestsum', 'judge-bin']);
    expect(run.configs.baseline.successCount).toBe(1);
    expect(run.configs.baseline.averageScore).toBeCloseTo(0.96);
    expect(await fs.pathExists(path.join(workspace.path, 'results', 'issues', 'baseline_cache-eviction-001.json'))).toBe(
      true,
    );

    const events = (await fs.readFile(path.join(workspace.path, 'logs', 'events.jsonl'), 'utf8'))
      .trim()
      .split('\n')
      .map((line) => JSON.parse(line).type);
    expect(events).toEqual(['AttemptEvaluated', 'AttemptRecorded', 'RunSaved']);
  });
});
