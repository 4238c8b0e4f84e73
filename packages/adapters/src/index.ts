export const name = '@mender/adapters';

export * from './types';
export * from './adapter';
export * from './base-adapter';
export * from './common';
export * from './openai/adapter';
export * from './fake/adapter';
