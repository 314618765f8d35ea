import { describe, it, expect } from 'vitest';
import { ZodError } from 'zod';
import { BenchmarkRunSchema, CorpusFileSchema, formatZodError } from './schemas';
import { BENCH_SCHEMA_VERSION } from './types';

describe('Bench Schemas', () => {
  describe('CorpusFileSchema', () => {
    const validCorpus = {
      name: 'go-issues',
      version: '1.2.0',
      issues: [
        {
          id: 'cache-eviction-001',
          title: 'Fix LRU eviction order',
          description: 'The cache evicts the most recently used entry.',
          difficulty: 'medium',
          task_type: 'bug_fix',
          language: 'go',
          eval_method: 'test_suite',
          test_command: 'go test ./cache/...',
          tags: ['cache'],
        },
      ],
    };

    it('should map snake_case keys onto the issue model', () => {
      const corpus = CorpusFileSchema.parse(validCorpus);
      expect(corpus.name).toBe('go-issues');
      expect(corpus.issues).toHaveLength(1);
      expect(corpus.issues[0]).toMatchObject({
        id: 'cache-eviction-001',
        taskType: 'bug_fix',
        evalMethod: 'test_suite',
        testCommand: 'go test ./cache/...',
        tags: ['cache'],
      });
    });

    it('should default eval_method to llm_judge and keep unknown methods as-is', () => {
      const corpus = CorpusFileSchema.parse({
        name: 'mixed',
        version: '1',
        issues: [
          { id: 'a', difficulty: 'easy', task_type: 'feature', language: 'python' },
          {
            id: 'b',
            difficulty: 'hard',
            task_type: 'test',
            language: 'rust',
            eval_method: 'snapshot_diff',
          },
        ],
      });
      expect(corpus.issues[0].evalMethod).toBe('llm_judge');
      expect(corpus.issues[1].evalMethod).toBe('snapshot_diff');
    });

    it('should coerce a numeric version to a string', () => {
      const corpus = CorpusFileSchema.parse({ name: 'n', version: 2, issues: [] });
      expect(corpus.version).toBe('2');
    });

    it('should reject an unknown difficulty', () => {
      const invalid = {
        ...validCorpus,
        issues: [{ ...validCorpus.issues[0], difficulty: 'extreme' }],
      };
      expect(() => CorpusFileSchema.parse(invalid)).toThrow(ZodError);
    });
  });

  describe('BenchmarkRunSchema', () => {
    const validRun = {
      schemaVersion: BENCH_SCHEMA_VERSION,
      timestamp: '2026-03-01T10:00:00.000Z',
      corpusName: 'go-issues',
      corpusVersion: '1.2.0',
      durationMs: 5000,
      configs: {
        baseline: {
          configName: 'baseline',
          results: [],
          total: 0,
          successCount: 0,
          successRate: 0,
          averageScore: 0,
          totalDurationMs: 0,
          byDifficulty: {},
          byTaskType: {},
          byLanguage: {},
        },
      },
    };

    it('should validate a valid run', () => {
      expect(BenchmarkRunSchema.parse(validRun)).toEqual(validRun);
    });

    it('should reject a wrong schema version', () => {
      expect(() => BenchmarkRunSchema.parse({ ...validRun, schemaVersion: 2 })).toThrow();
    });

    it('should reject an out-of-range success rate', () => {
      const invalid = {
        ...validRun,
        configs: { baseline: { ...validRun.configs.baseline, successRate: 1.5 } },
      };
      expect(() => BenchmarkRunSchema.parse(invalid)).toThrow();
    });
  });

  describe('formatZodError', () => {
    it('should render one path-prefixed line per issue', () => {
      const result = CorpusFileSchema.safeParse({
        name: 'n',
        issues: [{ id: 'x', difficulty: 'easy', task_type: 'feature' }],
      });
      expect(result.success).toBe(false);
      if (!result.success) {
        expect(formatZodError(result.error)).toBe('issues[0].language: Required');
      }
    });
  });
});
