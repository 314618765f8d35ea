import path from 'node:path';
import type { CommandRunner } from '@configbench/exec';
import { ConsoleLogger, JsonlLogger, type BenchConfig, type Corpus, type Logger } from '@configbench/shared';
import { Evaluator } from './dispatcher';
import { BenchmarkRecorder } from './recorder';
import { ReportRenderer } from './renderer';
import { RunStore } from './results';
import { createStrategySet, type DiffProvider } from './strategies';

export interface BenchmarkSessionOptions {
  config: BenchConfig;
  corpus: Pick<Corpus, 'name' | 'version'>;
  /** Resolves a relative `output.dir`; defaults to the process cwd */
  cwd?: string;
  runner?: CommandRunner;
  diffProvider?: DiffProvider;
  /** Overrides the logger derived from `output.eventLogPath` */
  logger?: Logger;
  configNames?: string[];
  color?: boolean;
  write?: (line: string) => void;
}

export interface BenchmarkSession {
  evaluator: Evaluator;
  recorder: BenchmarkRecorder;
  store: RunStore;
  renderer: ReportRenderer;
  logger: Logger;
}

/**
 * Wires strategies, evaluator, store, renderer and recorder from one config.
 */
export function createBenchmarkSession(options: BenchmarkSessionOptions): BenchmarkSession {
  const { config, corpus } = options;
  const cwd = options.cwd ?? process.cwd();
  const logger =
    options.logger ??
    (config.output.eventLogPath
      ? new JsonlLogger(path.resolve(cwd, config.output.eventLogPath))
      : new ConsoleLogger());

  const strategies = createStrategySet({
    runner: options.runner,
    diffProvider: options.diffProvider,
    config,
    logger,
  });
  const evaluator = new Evaluator({ strategies, logger, corpusName: corpus.name });
  const store = new RunStore(path.resolve(cwd, config.output.dir));
  const renderer = new ReportRenderer({ color: options.color, write: options.write });
  const recorder = new BenchmarkRecorder({
    corpus,
    evaluator,
    store,
    logger,
    renderer,
    configNames: options.configNames,
  });

  return { evaluator, recorder, store, renderer, logger };
}
