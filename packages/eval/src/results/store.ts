import path from 'node:path';
import fs from 'fs-extra';
import {
  BenchmarkRunSchema,
  ConfigError,
  atomicWriteJson,
  errorMessage,
  formatZodError,
  redactForLogs,
  type AttemptResult,
  type BenchmarkRun,
} from '@configbench/shared';

export function serializeRun(run: BenchmarkRun): string {
  return JSON.stringify(run, null, 2);
}

/**
 * Parses and validates a serialized run. Anything that is not a well-formed
 * run of the current schema version is a ConfigError.
 */
export function deserializeRun(json: string, source = 'benchmark run'): BenchmarkRun {
  let raw: unknown;
  try {
    raw = JSON.parse(json);
  } catch (error: unknown) {
    throw new ConfigError(`Invalid ${source}: ${errorMessage(error)}`, { cause: error });
  }

  const parsed = BenchmarkRunSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(`Invalid ${source}:\n${formatZodError(parsed.error)}`, {
      details: { issues: parsed.error.issues.length },
    });
  }
  return parsed.data;
}

/** `20260301-100000` for `2026-03-01T10:00:00Z`, always in UTC. */
export function formatRunStamp(timestamp: string): string {
  const date = new Date(timestamp);
  const pad = (n: number) => String(n).padStart(2, '0');
  return (
    `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}-` +
    `${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}`
  );
}

function fileSafe(part: string): string {
  return part.replace(/[^A-Za-z0-9._-]/g, '_');
}

export class RunStore {
  constructor(private readonly outputDir: string) {}

  runPath(run: BenchmarkRun): string {
    return path.join(this.outputDir, `benchmark_${formatRunStamp(run.timestamp)}.json`);
  }

  attemptPath(result: AttemptResult): string {
    return path.join(
      this.outputDir,
      'issues',
      `${fileSafe(result.configName)}_${fileSafe(result.issueId)}.json`,
    );
  }

  async saveRun(run: BenchmarkRun): Promise<string> {
    const filePath = this.runPath(run);
    await atomicWriteJson(filePath, redactForLogs(run));
    return filePath;
  }

  async saveAttempt(result: AttemptResult): Promise<string> {
    const filePath = this.attemptPath(result);
    await atomicWriteJson(filePath, redactForLogs(result));
    return filePath;
  }

  async loadRun(filePath: string): Promise<BenchmarkRun> {
    let json: string;
    try {
      json = await fs.readFile(filePath, 'utf8');
    } catch (error: unknown) {
      throw new ConfigError(`Could not read benchmark run ${filePath}: ${errorMessage(error)}`, {
        cause: error,
      });
    }
    return deserializeRun(json, `benchmark run ${filePath}`);
  }
}
