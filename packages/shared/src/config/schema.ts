import { z } from 'zod';

export const DEFAULT_TEST_COMMANDS: Record<string, string> = {
  go: 'go test ./...',
  typescript: 'npm test',
  javascript: 'npm test',
  python: 'pytest',
  rust: 'cargo test',
};

export const JudgeConfigSchema = z.object({
  /** Binary of the judging process */
  command: z.string().min(1).default('claude'),
  /** Arguments placed before the prompt */
  args: z.array(z.string()).default(['--print']),
  /** Whether the prompt is appended as the last argument or written to stdin */
  promptVia: z.enum(['argument', 'stdin']).default('argument'),
  timeoutMs: z.number().int().positive().default(2 * 60 * 1000),
});

export const TestSuiteConfigSchema = z.object({
  timeoutMs: z.number().int().positive().default(5 * 60 * 1000),
  /** Language → command used when an issue names no test command */
  defaultCommands: z.record(z.string(), z.string()).default(DEFAULT_TEST_COMMANDS),
  fallbackCommand: z.string().default('make test'),
});

export const CustomCheckConfigSchema = z.object({
  timeoutMs: z.number().int().positive().default(2 * 60 * 1000),
  /** File the script body is written to, relative to the attempt's working tree */
  scriptName: z.string().min(1).default('.bench_check.sh'),
  shell: z.string().min(1).default('bash'),
});

export const OutputConfigSchema = z.object({
  dir: z.string().default('.configbench/results'),
  /** Optional JSONL event log */
  eventLogPath: z.string().optional(),
});

export const BenchConfigSchema = z.object({
  configVersion: z.literal(1).default(1),
  judge: JudgeConfigSchema.default({}),
  testSuite: TestSuiteConfigSchema.default({}),
  customCheck: CustomCheckConfigSchema.default({}),
  output: OutputConfigSchema.default({}),
});

export type JudgeConfig = z.infer<typeof JudgeConfigSchema>;
export type TestSuiteConfig = z.infer<typeof TestSuiteConfigSchema>;
export type CustomCheckConfig = z.infer<typeof CustomCheckConfigSchema>;
export type OutputConfig = z.infer<typeof OutputConfigSchema>;
export type BenchConfig = z.infer<typeof BenchConfigSchema>;
/** Config as written by users: every field optional. */
export type BenchConfigInput = z.input<typeof BenchConfigSchema>;

export const DEFAULT_CONFIG: BenchConfig = BenchConfigSchema.parse({});
