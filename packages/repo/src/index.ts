export const name = '@mender/repo';

export * from './scanner';
