export * from './types';
export * from './issue';
export * from './plan';
export * from './outcome';
export * from './verdict';
