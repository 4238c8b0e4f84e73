import type { MenderEvent } from '../types/events';
import { formatBindings, isLevelEnabled, type LogLevel } from './level';
import type { Logger } from './types';

/**
 * Human-facing logger. Structured events are only echoed at debug level.
 */
export class ConsoleLogger implements Logger {
  constructor(private readonly level: LogLevel = 'info') {}

  log(event: MenderEvent): void {
    if (isLevelEnabled('debug', this.level)) {
      console.log(JSON.stringify(event));
    }
  }

  trace(event: MenderEvent, message: string): void {
    if (isLevelEnabled('debug', this.level)) {
      console.log(message, JSON.stringify(event));
    } else if (isLevelEnabled('info', this.level)) {
      console.log(message);
    }
  }

  debug(message: string): void {
    if (isLevelEnabled('debug', this.level)) console.debug(message);
  }

  info(message: string): void {
    if (isLevelEnabled('info', this.level)) console.info(message);
  }

  warn(message: string): void {
    if (isLevelEnabled('warn', this.level)) console.warn(message);
  }

  error(error: Error, message?: string): void {
    if (message) {
      console.error(message, error);
    } else {
      console.error(error);
    }
  }

  child(bindings: Record<string, unknown>): Logger {
    return new ScopedLogger(this, bindings);
  }
}

class ScopedLogger implements Logger {
  constructor(
    private readonly base: Logger,
    private readonly bindings: Record<string, unknown>,
  ) {}

  log(event: MenderEvent) {
    return this.base.log(event);
  }

  trace(event: MenderEvent, message: string) {
    return this.base.trace(event, formatBindings(this.bindings, message));
  }

  debug(message: string) {
    return this.base.debug(formatBindings(this.bindings, message));
  }

  info(message: string) {
    return this.base.info(formatBindings(this.bindings, message));
  }

  warn(message: string) {
    return this.base.warn(formatBindings(this.bindings, message));
  }

  error(error: Error, message?: string) {
    return this.base.error(error, message ? formatBindings(this.bindings, message) : undefined);
  }

  child(bindings: Record<string, unknown>): Logger {
    return new ScopedLogger(this.base, { ...this.bindings, ...bindings });
  }
}
