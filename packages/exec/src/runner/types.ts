export interface ProcessRunRequest {
  /** Program to spawn, or the whole command line when `shell` is set */
  command: string;
  args?: string[];
  cwd?: string;
  /** Merged over the parent environment */
  env?: Record<string, string>;
  /** Written to stdin, which is closed afterwards */
  input?: string;
  shell?: boolean;
  /** Hard deadline; the process tree is killed when it expires */
  timeoutMs: number;
  /** Combined stdout/stderr cap; the process is killed once exceeded */
  maxOutputBytes?: number;
  signal?: AbortSignal;
}

export interface ProcessRunResult {
  /** -1 when the process was terminated by a signal */
  exitCode: number;
  stdout: string;
  stderr: string;
  durationMs: number;
  truncated: boolean;
}

/**
 * Anything that can run a process to completion. Strategies and the git service
 * depend on this rather than on child_process so tests can substitute a fake.
 */
export interface CommandRunner {
  run(request: ProcessRunRequest): Promise<ProcessRunResult>;
}
