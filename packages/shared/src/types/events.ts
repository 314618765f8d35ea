/**
 * Base interface for all benchmark events.
 * All events include common metadata fields.
 */
export interface BaseEvent {
  /** Schema version for event format compatibility */
  schemaVersion: number;
  /** ISO 8601 timestamp when the event occurred */
  timestamp: string;
  /** Name of the corpus the benchmark run evaluates */
  corpusName: string;
  /** Event type discriminator */
  type: string;
}

/** Emitted when a strategy has produced a verdict for one attempt. */
export interface AttemptEvaluated extends BaseEvent {
  type: 'AttemptEvaluated';
  payload: {
    issueId: string;
    /** The method the strategy was selected by, after fallback */
    method: string;
    success: boolean;
    score: number;
    durationMs: number;
  };
}

/** Emitted when an attempt result has been folded into its configuration summary. */
export interface AttemptRecorded extends BaseEvent {
  type: 'AttemptRecorded';
  payload: {
    issueId: string;
    configName: string;
    success: boolean;
    score: number;
    /** Running success rate of the configuration after this attempt */
    successRate: number;
    error?: string;
  };
}

/** Emitted when a finished benchmark run has been written to disk. */
export interface RunSaved extends BaseEvent {
  type: 'RunSaved';
  payload: {
    path: string;
    configNames: string[];
    durationMs: number;
  };
}

export type BenchEvent = AttemptEvaluated | AttemptRecorded | RunSaved;

export const BENCH_EVENT_SCHEMA_VERSION = 1;
