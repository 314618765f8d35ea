import * as fs from 'fs/promises';
import { ensureParentDir } from '../fs/io';
import type { BenchEvent } from '../types/events';
import { redactForLogs } from '../redaction';
import { formatPrefix } from './consoleLogger';
import type { Logger } from './types';

export class JsonlLogger implements Logger {
  private filePath: string;
  private readonly bindings: Record<string, unknown>;

  constructor(filePath: string, bindings: Record<string, unknown> = {}) {
    this.filePath = filePath;
    this.bindings = bindings;
  }

  async log(event: BenchEvent): Promise<void> {
    const line = JSON.stringify(redactForLogs(event)) + '\n';
    try {
      await ensureParentDir(this.filePath);
      await fs.appendFile(this.filePath, line, 'utf8');
    } catch (error) {
      // Logging never fails the run.
      console.error(`Failed to write to log file at ${this.filePath}`, error);
    }
  }

  async trace(event: BenchEvent, _message: string): Promise<void> {
    await this.log(event);
  }

  debug(message: string): void {
    console.debug(formatPrefix(this.bindings, message));
  }

  info(message: string): void {
    console.info(formatPrefix(this.bindings, message));
  }

  warn(message: string): void {
    console.warn(formatPrefix(this.bindings, message));
  }

  error(error: Error, message?: string): void {
    if (message) {
      console.error(formatPrefix(this.bindings, message), error);
    } else {
      console.error(error);
    }
  }

  child(bindings: Record<string, unknown>): Logger {
    return new JsonlLogger(this.filePath, { ...this.bindings, ...bindings });
  }
}
