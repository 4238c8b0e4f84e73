export * from './types';
export * from './prompts';
export * from './context';
export * from './auditor';
export * from './fixer';
export * from './judge';
export * from './lint';
