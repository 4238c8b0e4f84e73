export * from './types';
export * from './state';
export * from './statistics';
export * from './detector';
export * from './timeout';
export * from './control-loop';
