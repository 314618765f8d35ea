export const BENCH_SCHEMA_VERSION = 1;

/** Score at or above which an attempt counts as a success. */
export const ACCEPTANCE_THRESHOLD = 0.7;

/** Percentage-point delta at or above which a comparison is flagged. */
export const SIGNIFICANCE_THRESHOLD_POINTS = 5.0;

export const DIFFICULTIES = ['easy', 'medium', 'hard'] as const;
export type Difficulty = (typeof DIFFICULTIES)[number];

export const TASK_TYPES = ['bug_fix', 'feature', 'refactor', 'test', 'documentation'] as const;
export type TaskType = (typeof TASK_TYPES)[number];

export const EVAL_METHODS = ['test_suite', 'llm_judge', 'custom_check', 'hybrid'] as const;
export type EvalMethod = (typeof EVAL_METHODS)[number];

export interface Issue {
  id: string;
  title: string;
  description: string;
  difficulty: Difficulty;
  taskType: TaskType;
  /** Primary language of the target repository (go, typescript, python, ...) */
  language: string;
  /**
   * How the attempt is judged. Kept as a plain string: corpora may carry tags this
   * build does not know, and those fall back to the judged assessment.
   */
  evalMethod: string;
  /** test_suite / hybrid: command to run instead of the language default */
  testCommand?: string;
  /** llm_judge / hybrid: what a correct solution looks like */
  successCriteria?: string;
  /** custom_check: shell script body, exit 0 means success */
  checkScript?: string;
  repoUrl?: string;
  repoRef?: string;
  issueUrl?: string;
  prompt?: string;
  expectedFiles?: string[];
  contextFiles?: string[];
  tags?: string[];
}

export interface Corpus {
  name: string;
  description?: string;
  version: string;
  issues: Issue[];
}

export interface CorpusStats {
  total: number;
  byDifficulty: Partial<Record<Difficulty, number>>;
  byTaskType: Partial<Record<TaskType, number>>;
  byLanguage: Record<string, number>;
}

export interface Verdict {
  success: boolean;
  /** Always within [0, 1] */
  score: number;
  details: string;
}

export interface AttemptResult {
  issueId: string;
  configName: string;
  difficulty: Difficulty;
  taskType: TaskType;
  language: string;
  success: boolean;
  score: number;
  evalDetails: string;
  error?: string;
  durationMs: number;
  /** Kept for post-mortem debugging of the attempt */
  workDir: string;
  /** Transcript produced by the coding agent */
  output?: string;
}

export interface PartitionStats {
  total: number;
  successes: number;
  successRate: number;
  avgScore: number;
}

export interface ConfigSummary {
  configName: string;
  results: AttemptResult[];
  total: number;
  successCount: number;
  successRate: number;
  averageScore: number;
  totalDurationMs: number;
  byDifficulty: Partial<Record<Difficulty, PartitionStats>>;
  byTaskType: Partial<Record<TaskType, PartitionStats>>;
  byLanguage: Record<string, PartitionStats>;
}

export interface BenchmarkRun {
  schemaVersion: typeof BENCH_SCHEMA_VERSION;
  /** ISO 8601 */
  timestamp: string;
  corpusName: string;
  corpusVersion: string;
  durationMs: number;
  configs: Record<string, ConfigSummary>;
}

export interface Comparison {
  baselineConfig: string;
  candidateConfig: string;
  baselineRate: number;
  candidateRate: number;
  /** Signed, in percentage points */
  delta: number;
  significant: boolean;
}
