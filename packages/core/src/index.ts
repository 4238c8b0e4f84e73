export const name = '@mender/core';

export * from './model';
export * from './normalize';
export * from './loop';
export * from './workers';
export * from './config';
export * from './registry';
