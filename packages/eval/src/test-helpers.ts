import { vi } from 'vitest';
import type { CommandRunner, ProcessRunRequest, ProcessRunResult } from '@configbench/exec';
import type { AttemptResult, Issue } from '@configbench/shared';

export type Responder = (request: ProcessRunRequest) => Partial<ProcessRunResult> | Error;

/**
 * A CommandRunner that records requests and answers from `respond`. Returning an
 * Error makes the run reject with it.
 */
export function fakeRunner(respond: Responder = () => ({})) {
  const requests: ProcessRunRequest[] = [];
  const runner: CommandRunner = {
    run: vi.fn(async (request: ProcessRunRequest): Promise<ProcessRunResult> => {
      requests.push(request);
      const response = respond(request);
      if (response instanceof Error) {
        throw response;
      }
      return { exitCode: 0, stdout: '', stderr: '', durationMs: 5, truncated: false, ...response };
    }),
  };
  return { runner, requests };
}

export function makeIssue(overrides: Partial<Issue> = {}): Issue {
  return {
    id: 'cache-eviction-001',
    title: 'Fix LRU eviction order',
    description: 'The cache evicts the most recently used entry instead of the least.',
    difficulty: 'medium',
    taskType: 'bug_fix',
    language: 'go',
    evalMethod: 'test_suite',
    ...overrides,
  };
}

export function makeResult(overrides: Partial<AttemptResult> = {}): AttemptResult {
  return {
    issueId: 'cache-eviction-001',
    configName: 'baseline',
    difficulty: 'medium',
    taskType: 'bug_fix',
    language: 'go',
    success: true,
    score: 1,
    evalDetails: 'All tests passed',
    durationMs: 1000,
    workDir: '/tmp/attempt',
    ...overrides,
  };
}
