export const name = '@mender/shared';

export * from './types/events';
export * from './types/llm';
export * from './logger';
export * from './redaction';
export * from './errors';
export * from './json-utils';
export * from './string-utils';
export * from './fs/path';
export * from './fs/io';
export * from './fs/artifacts';
export * from './config/schema';
export * from './summary/summary';
