import {
  BENCH_EVENT_SCHEMA_VERSION,
  BENCH_SCHEMA_VERSION,
  SilentLogger,
  errorMessage,
  type AttemptResult,
  type BenchmarkRun,
  type ConfigSummary,
  type Corpus,
  type Issue,
  type Logger,
} from '@configbench/shared';
import type { Evaluator } from './dispatcher';
import type { ReportRenderer } from './renderer';
import { createAttemptResult, createConfigSummary, foldResult, type AttemptEvidence, type RunStore } from './results';

export interface BenchmarkRecorderOptions {
  corpus: Pick<Corpus, 'name' | 'version'>;
  evaluator: Evaluator;
  /** Persists every attempt and the finished run when given */
  store?: RunStore;
  logger?: Logger;
  /** Prints progress lines when given */
  renderer?: ReportRenderer;
  /** Configurations reported even if they never record an attempt */
  configNames?: string[];
  now?: () => Date;
}

export interface AttemptRecord extends AttemptEvidence {
  output: string;
  signal?: AbortSignal;
}

/**
 * Collects finished attempts into per-configuration summaries. Each attempt is
 * evaluated, written to disk when a store is given, and folded into its
 * configuration's summary. Folding happens synchronously after the last await,
 * so attempts recorded concurrently never lose an update. A failed attempt save
 * is logged and the attempt still counts once.
 */
export class BenchmarkRecorder {
  private summaries = new Map<string, ConfigSummary>();
  private readonly startedAt: Date;
  private readonly now: () => Date;
  private logger: Logger;

  constructor(private readonly options: BenchmarkRecorderOptions) {
    this.now = options.now ?? (() => new Date());
    this.startedAt = this.now();
    this.logger = options.logger ?? new SilentLogger();
    for (const name of options.configNames ?? []) {
      this.summaries.set(name, createConfigSummary(name));
    }
  }

  announce(configName: string, issue: Issue, index: number, total: number): void {
    this.options.renderer?.logAttemptStarted(configName, issue, index, total);
  }

  async record(attempt: AttemptRecord): Promise<AttemptResult> {
    const verdict = await this.options.evaluator.evaluate(
      attempt.issue,
      attempt.workDir,
      attempt.output,
      attempt.signal,
    );
    const result = createAttemptResult(attempt, verdict);

    if (this.options.store) {
      await this.saveAttempt(this.options.store, result);
    }

    const summary = foldResult(this.summaryFor(result.configName), result);
    this.summaries.set(result.configName, summary);
    this.options.renderer?.logAttemptFinished(result);

    await this.logger.log({
      ...this.eventBase(),
      type: 'AttemptRecorded',
      payload: {
        issueId: result.issueId,
        configName: result.configName,
        success: result.success,
        score: result.score,
        successRate: summary.successRate,
        ...(result.error !== undefined ? { error: result.error } : {}),
      },
    });
    return result;
  }

  summary(configName: string): ConfigSummary | undefined {
    return this.summaries.get(configName);
  }

  snapshot(): BenchmarkRun {
    return {
      schemaVersion: BENCH_SCHEMA_VERSION,
      timestamp: this.startedAt.toISOString(),
      corpusName: this.options.corpus.name,
      corpusVersion: this.options.corpus.version,
      durationMs: this.now().getTime() - this.startedAt.getTime(),
      configs: Object.fromEntries(this.summaries),
    };
  }

  /**
   * Closes the run. With a store the run is saved and a RunSaved event logged.
   */
  async finish(): Promise<BenchmarkRun> {
    const run = this.snapshot();
    if (this.options.store) {
      const path = await this.options.store.saveRun(run);
      await this.logger.trace(
        {
          ...this.eventBase(),
          type: 'RunSaved',
          payload: { path, configNames: Object.keys(run.configs).sort(), durationMs: run.durationMs },
        },
        `Saved benchmark run to ${path}`,
      );
    }
    return run;
  }

  private async saveAttempt(store: RunStore, result: AttemptResult): Promise<void> {
    try {
      await store.saveAttempt(result);
    } catch (error) {
      await this.logger
        .child({ config: result.configName, issue: result.issueId })
        .error(error instanceof Error ? error : new Error(errorMessage(error)), 'Could not save attempt result');
    }
  }

  private summaryFor(configName: string): ConfigSummary {
    return this.summaries.get(configName) ?? createConfigSummary(configName);
  }

  private eventBase() {
    return {
      schemaVersion: BENCH_EVENT_SCHEMA_VERSION,
      timestamp: this.now().toISOString(),
      corpusName: this.options.corpus.name,
    };
  }
}
