import { z } from 'zod';
import {
  BENCH_SCHEMA_VERSION,
  DIFFICULTIES,
  TASK_TYPES,
  type Issue,
} from './types';

// Corpus files are hand-written YAML and use snake_case keys.
const IssueFileSchema = z
  .object({
    id: z.string().min(1),
    title: z.string().default(''),
    description: z.string().default(''),
    difficulty: z.enum(DIFFICULTIES),
    task_type: z.enum(TASK_TYPES),
    language: z.string().min(1),
    eval_method: z.string().default('llm_judge'),
    test_command: z.string().optional(),
    success_criteria: z.string().optional(),
    check_script: z.string().optional(),
    repo_url: z.string().optional(),
    repo_ref: z.string().optional(),
    issue_url: z.string().optional(),
    prompt: z.string().optional(),
    expected_files: z.array(z.string()).optional(),
    context_files: z.array(z.string()).optional(),
    tags: z.array(z.string()).optional(),
  })
  .transform(
    (raw): Issue => ({
      id: raw.id,
      title: raw.title,
      description: raw.description,
      difficulty: raw.difficulty,
      taskType: raw.task_type,
      language: raw.language,
      evalMethod: raw.eval_method,
      testCommand: raw.test_command,
      successCriteria: raw.success_criteria,
      checkScript: raw.check_script,
      repoUrl: raw.repo_url,
      repoRef: raw.repo_ref,
      issueUrl: raw.issue_url,
      prompt: raw.prompt,
      expectedFiles: raw.expected_files,
      contextFiles: raw.context_files,
      tags: raw.tags,
    }),
  );

export const CorpusFileSchema = z.object({
  name: z.string().min(1),
  description: z.string().optional(),
  version: z.coerce.string().default('0.0.0'),
  issues: z.array(IssueFileSchema).default([]),
});

const PartitionStatsSchema = z.object({
  total: z.number().int().nonnegative(),
  successes: z.number().int().nonnegative(),
  successRate: z.number().min(0).max(1),
  avgScore: z.number().min(0).max(1),
});

const AttemptResultSchema = z.object({
  issueId: z.string(),
  configName: z.string(),
  difficulty: z.enum(DIFFICULTIES),
  taskType: z.enum(TASK_TYPES),
  language: z.string(),
  success: z.boolean(),
  score: z.number().min(0).max(1),
  evalDetails: z.string(),
  error: z.string().optional(),
  durationMs: z.number().nonnegative(),
  workDir: z.string(),
  output: z.string().optional(),
});

const ConfigSummarySchema = z.object({
  configName: z.string(),
  results: z.array(AttemptResultSchema),
  total: z.number().int().nonnegative(),
  successCount: z.number().int().nonnegative(),
  successRate: z.number().min(0).max(1),
  averageScore: z.number().min(0).max(1),
  totalDurationMs: z.number().nonnegative(),
  byDifficulty: z.record(z.enum(DIFFICULTIES), PartitionStatsSchema),
  byTaskType: z.record(z.enum(TASK_TYPES), PartitionStatsSchema),
  byLanguage: z.record(z.string(), PartitionStatsSchema),
});

export const BenchmarkRunSchema = z.object({
  schemaVersion: z.literal(BENCH_SCHEMA_VERSION),
  timestamp: z.string().datetime({ offset: true }),
  corpusName: z.string(),
  corpusVersion: z.string(),
  durationMs: z.number().nonnegative(),
  configs: z.record(z.string(), ConfigSummarySchema),
});

/**
 * Flattens a zod error into `path: message` lines.
 */
export function formatZodError(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const path = issue.path
        .map((segment) => (typeof segment === 'number' ? `[${segment}]` : `.${segment}`))
        .join('')
        .replace(/^\./, '');
      return path ? `${path}: ${issue.message}` : issue.message;
    })
    .join('\n');
}
