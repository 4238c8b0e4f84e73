export * from './loader';
export * from './duration';
export * from './roles';
