import * as fs from 'fs/promises';
import type { MenderEvent } from '../types/events';
import { redactForLogs } from '../redaction';
import { formatBindings, isLevelEnabled, type LogLevel } from './level';
import type { Logger } from './types';

/**
 * Appends every structured event to a JSONL trace file and mirrors plain
 * messages to the console.
 */
export class JsonlLogger implements Logger {
  constructor(
    private readonly filePath: string,
    private readonly bindings: Record<string, unknown> = {},
    private readonly level: LogLevel = 'info',
  ) {}

  async log(event: MenderEvent): Promise<void> {
    const line = JSON.stringify(redactForLogs(event)) + '\n';
    try {
      await fs.appendFile(this.filePath, line, 'utf8');
    } catch (error) {
      // Trace output must not fail the run.
      console.error(`Failed to write to log file at ${this.filePath}`, error);
    }
  }

  async trace(event: MenderEvent, message: string): Promise<void> {
    await this.log(event);
    this.debug(message);
  }

  debug(message: string): void {
    if (isLevelEnabled('debug', this.level)) console.debug(formatBindings(this.bindings, message));
  }

  info(message: string): void {
    if (isLevelEnabled('info', this.level)) console.info(formatBindings(this.bindings, message));
  }

  warn(message: string): void {
    if (isLevelEnabled('warn', this.level)) console.warn(formatBindings(this.bindings, message));
  }

  error(error: Error, message?: string): void {
    if (message) {
      console.error(formatBindings(this.bindings, message), error);
    } else {
      console.error(error);
    }
  }

  child(bindings: Record<string, unknown>): Logger {
    return new JsonlLogger(this.filePath, { ...this.bindings, ...bindings }, this.level);
  }
}
