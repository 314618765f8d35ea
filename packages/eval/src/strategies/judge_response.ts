import { truncateOutput, type Issue } from '@configbench/shared';

export const DIFF_PROMPT_LIMIT = 3000;
export const OUTPUT_PROMPT_LIMIT = 2000;
export const FALLBACK_REASON_LIMIT = 200;

export interface JudgeResponse {
  score: number;
  reason: string;
}

const SCORE_LINE = /^\s*score:\s*(.*)$/i;
const REASON_LINE = /^\s*reason:\s*(.*)$/i;
const LEADING_NUMBER = /^[+-]?(?:\d+(?:\.\d*)?|\.\d+)/;

/**
 * Reads `SCORE:` and `REASON:` lines from a judge's reply. Scores above 1 are
 * taken as percentages. A reply with neither line is scored by keyword.
 */
export function parseJudgeResponse(response: string): JudgeResponse {
  let score: number | undefined;
  let reason: string | undefined;

  for (const line of response.split('\n')) {
    const scoreMatch = SCORE_LINE.exec(line);
    if (scoreMatch) {
      score = parseScoreValue(scoreMatch[1] ?? '');
      continue;
    }
    const reasonMatch = REASON_LINE.exec(line);
    if (reasonMatch) {
      reason = (reasonMatch[1] ?? '').trim();
    }
  }

  if (score === undefined && reason === undefined) {
    return {
      score: keywordScore(response),
      reason: truncateOutput(response, FALLBACK_REASON_LIMIT),
    };
  }

  return { score: score ?? 0, reason: reason ?? '' };
}

function parseScoreValue(text: string): number {
  const match = LEADING_NUMBER.exec(text.trim());
  if (!match) {
    return 0;
  }
  let value = Number.parseFloat(match[0]);
  if (Number.isNaN(value)) {
    return 0;
  }
  if (value > 1) {
    value = value / 100;
  }
  return Math.min(1, Math.max(0, value));
}

function keywordScore(response: string): number {
  const upper = response.toUpperCase();
  if (upper.includes('SUCCESS') || upper.includes('CORRECT')) {
    return 0.8;
  }
  if (upper.includes('PARTIAL')) {
    return 0.5;
  }
  return 0;
}

export function buildJudgePrompt(issue: Issue, diff: string, output: string): string {
  const criteria =
    issue.successCriteria && issue.successCriteria.trim() !== ''
      ? issue.successCriteria
      : `The code changes successfully address: ${issue.description}`;

  return [
    'You are grading whether an automated coding assistant solved a programming task.',
    '',
    '## Task',
    issue.description,
    '',
    '## Success Criteria',
    criteria,
    '',
    '## Code Changes (git diff)',
    truncateOutput(diff, DIFF_PROMPT_LIMIT),
    '',
    '## Assistant Transcript',
    truncateOutput(output, OUTPUT_PROMPT_LIMIT),
    '',
    '## How to Grade',
    '1. Are the code changes appropriate for the task?',
    '2. Do they resolve the problem described above?',
    '3. Do they introduce obvious bugs?',
    '',
    'Give a score from 0 to 100 and explain it. Reply in exactly this format:',
    'SCORE: <number>',
    'REASON: <explanation>',
    '',
  ].join('\n');
}
