import type { MenderEvent } from '../types/events';
import type { Logger } from './types';

export class NoopLogger implements Logger {
  log(_event: MenderEvent): void {}
  trace(_event: MenderEvent, _message: string): void {}
  debug(_message: string): void {}
  info(_message: string): void {}
  warn(_message: string): void {}
  error(_error: Error, _message?: string): void {}
  child(_bindings: Record<string, unknown>): Logger {
    return this;
  }
}
