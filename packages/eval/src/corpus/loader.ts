import path from 'node:path';
import fs from 'fs-extra';
import yaml from 'js-yaml';
import {
  CorpusError,
  CorpusFileSchema,
  errorMessage,
  formatZodError,
  type Corpus,
  type CorpusStats,
  type Difficulty,
  type Issue,
  type TaskType,
} from '@configbench/shared';

export interface IssueFilter {
  difficulty?: Difficulty;
  taskType?: TaskType;
  language?: string;
  /** An issue matches when it carries any of these tags */
  tags?: string[];
}

export async function loadCorpus(filePath: string): Promise<Corpus> {
  let content: string;
  try {
    content = await fs.readFile(filePath, 'utf8');
  } catch (error: unknown) {
    throw new CorpusError(filePath, `could not be read: ${errorMessage(error)}`, { cause: error });
  }

  let raw: unknown;
  try {
    raw = yaml.load(content);
  } catch (error: unknown) {
    if (error instanceof yaml.YAMLException) {
      throw new CorpusError(filePath, `invalid YAML\n${error.message}`, { cause: error });
    }
    throw error;
  }

  const parsed = CorpusFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new CorpusError(filePath, `does not match the corpus format\n${formatZodError(parsed.error)}`);
  }
  return parsed.data;
}

/**
 * Merges every `*.yaml`/`*.yml` corpus in `dir` (in file name order) into one
 * corpus. Issue ids must be unique across files.
 */
export async function loadCorpusDir(dir: string): Promise<Corpus> {
  let entries: string[];
  try {
    entries = await fs.readdir(dir);
  } catch (error: unknown) {
    throw new CorpusError(dir, `could not be listed: ${errorMessage(error)}`, { cause: error });
  }

  const files = entries.filter((name) => /\.ya?ml$/i.test(name)).sort();
  const issues: Issue[] = [];
  const origin = new Map<string, string>();

  for (const file of files) {
    const filePath = path.join(dir, file);
    const corpus = await loadCorpus(filePath);
    for (const issue of corpus.issues) {
      const seenIn = origin.get(issue.id);
      if (seenIn !== undefined) {
        throw new CorpusError(filePath, `duplicate issue id "${issue.id}" (first defined in ${seenIn})`);
      }
      origin.set(issue.id, filePath);
      issues.push(issue);
    }
  }

  return {
    name: 'combined',
    description: 'Combined corpus from multiple files',
    version: '1.0.0',
    issues,
  };
}

export function filterIssues(corpus: Corpus, filter: IssueFilter = {}): Issue[] {
  return corpus.issues.filter((issue) => {
    if (filter.difficulty !== undefined && issue.difficulty !== filter.difficulty) {
      return false;
    }
    if (filter.taskType !== undefined && issue.taskType !== filter.taskType) {
      return false;
    }
    if (filter.language !== undefined && issue.language !== filter.language) {
      return false;
    }
    if (filter.tags !== undefined && filter.tags.length > 0) {
      const tags = new Set(issue.tags ?? []);
      return filter.tags.some((tag) => tags.has(tag));
    }
    return true;
  });
}

export function corpusStats(corpus: Corpus): CorpusStats {
  const stats: CorpusStats = {
    total: corpus.issues.length,
    byDifficulty: {},
    byTaskType: {},
    byLanguage: {},
  };

  for (const issue of corpus.issues) {
    stats.byDifficulty[issue.difficulty] = (stats.byDifficulty[issue.difficulty] ?? 0) + 1;
    stats.byTaskType[issue.taskType] = (stats.byTaskType[issue.taskType] ?? 0) + 1;
    stats.byLanguage[issue.language] = (stats.byLanguage[issue.language] ?? 0) + 1;
  }
  return stats;
}
