export type { Logger, MaybePromise } from './types';
export type { LogLevel } from './level';
export { ConsoleLogger } from './consoleLogger';
export { JsonlLogger } from './jsonlLogger';
export { NoopLogger } from './noopLogger';
