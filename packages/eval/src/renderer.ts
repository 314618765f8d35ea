import { Chalk, type ChalkInstance } from 'chalk';
import {
  DIFFICULTIES,
  truncateName,
  type AttemptResult,
  type BenchmarkRun,
  type ConfigSummary,
  type Issue,
  type PartitionStats,
} from '@configbench/shared';
import { BASELINE_CONFIG, compareAllToBaseline } from './results';
import { formatPercent } from './strategies';

const NAME_WIDTH = 20;
const RULE_WIDTH = 61;

export interface ReportRendererOptions {
  /** Defaults to chalk's terminal detection */
  color?: boolean;
  /** Line sink, console.log by default */
  write?: (line: string) => void;
}

export function formatDelta(points: number): string {
  return `${points >= 0 ? '+' : ''}${points.toFixed(1)}`;
}

/** Whole seconds in `1h2m3s` form. */
export function formatDuration(ms: number): string {
  const totalSeconds = Math.round(ms / 1000);
  const hours = Math.floor(totalSeconds / 3600);
  const minutes = Math.floor((totalSeconds % 3600) / 60);
  const seconds = totalSeconds % 60;
  if (hours > 0) {
    return `${hours}h${minutes}m${seconds}s`;
  }
  if (minutes > 0) {
    return `${minutes}m${seconds}s`;
  }
  return `${seconds}s`;
}

function formatRunTime(timestamp: string): string {
  // YYYY-MM-DD HH:MM in UTC
  return new Date(timestamp).toISOString().slice(0, 16).replace('T', ' ');
}

function sortedConfigs(run: BenchmarkRun): ConfigSummary[] {
  return Object.entries(run.configs)
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([, summary]) => summary);
}

export class ReportRenderer {
  private chalk: ChalkInstance;
  private write: (line: string) => void;

  constructor(options: ReportRendererOptions = {}) {
    this.chalk = options.color === false ? new Chalk({ level: 0 }) : new Chalk();
    this.write = options.write ?? ((line) => console.log(line));
  }

  render(run: BenchmarkRun): string {
    const c = this.chalk;
    const configs = sortedConfigs(run);
    const lines: string[] = [
      c.bold('='.repeat(RULE_WIDTH)),
      c.bold.cyan(`BENCHMARK REPORT: ${run.corpusName}`),
      `Version: ${run.corpusVersion} | Run: ${formatRunTime(run.timestamp)} | Duration: ${formatDuration(run.durationMs)}`,
      c.bold('='.repeat(RULE_WIDTH)),
      '',
      c.bold('## Summary by Configuration'),
      '',
      `${'Config'.padEnd(NAME_WIDTH)} ${'Success'.padStart(8)} ${'Score'.padStart(8)} ${'Duration'.padStart(10)}`,
      '-'.repeat(50),
    ];

    for (const summary of configs) {
      lines.push(
        `${this.name(summary.configName)} ` +
          this.rate(summary.successRate, formatPercent(summary.successRate).padStart(8)) +
          ` ${formatPercent(summary.averageScore).padStart(8)} ${formatDuration(summary.totalDurationMs).padStart(10)}`,
      );
    }

    lines.push(
      '',
      c.bold('## Success Rate by Difficulty'),
      '',
      `${'Config'.padEnd(NAME_WIDTH)}${DIFFICULTIES.map((d) => ` ${capitalize(d).padStart(10)}`).join('')}`,
      '-'.repeat(53),
    );
    for (const summary of configs) {
      const cells = DIFFICULTIES.map((difficulty) => ` ${this.partitionCell(summary.byDifficulty[difficulty])}`);
      lines.push(`${this.name(summary.configName)}${cells.join('')}`);
    }

    if (Object.hasOwn(run.configs, BASELINE_CONFIG)) {
      lines.push('', c.bold('## Improvement vs Baseline'), '');
      for (const comparison of compareAllToBaseline(run, BASELINE_CONFIG)) {
        const delta = formatDelta(comparison.delta);
        const colored = comparison.delta >= 0 ? c.green(delta) : c.red(delta);
        lines.push(
          `  ${comparison.candidateConfig}: ${colored} percentage points` +
            (comparison.significant ? c.yellow(' (significant)') : ''),
        );
      }
    }

    lines.push('');
    return lines.join('\n');
  }

  print(run: BenchmarkRun): void {
    this.write(this.render(run));
  }

  logAttemptStarted(configName: string, issue: Issue, index: number, total: number): void {
    const c = this.chalk;
    this.write(
      c.gray(`(${index + 1}/${total})`) +
        ` ${c.yellow(`[${configName}]`)} Starting issue: ${c.bold(issue.id)} - ${issue.title}`,
    );
  }

  logAttemptFinished(result: AttemptResult): void {
    const c = this.chalk;
    const badge = result.error ? c.red.bold('ERROR') : result.success ? c.green.bold('PASS') : c.red.bold('FAIL');
    this.write(
      `  ${c.yellow(`[${result.configName}]`)} Finished issue: ${c.bold(result.issueId)} in ` +
        `${formatDuration(result.durationMs)}. Status: ${badge} (score ${formatPercent(result.score)})`,
    );
    if (result.error) {
      this.write(c.red(`    Error: ${result.error}`));
    }
  }

  private name(configName: string): string {
    return truncateName(configName, NAME_WIDTH).padEnd(NAME_WIDTH);
  }

  private rate(rate: number, text: string): string {
    const color = rate > 0.8 ? this.chalk.green : rate > 0.5 ? this.chalk.yellow : this.chalk.red;
    return color(text);
  }

  private partitionCell(stats: PartitionStats | undefined): string {
    if (stats === undefined) {
      return '-'.padStart(10);
    }
    return this.rate(stats.successRate, formatPercent(stats.successRate).padStart(10));
  }
}

function capitalize(word: string): string {
  return word.charAt(0).toUpperCase() + word.slice(1);
}
