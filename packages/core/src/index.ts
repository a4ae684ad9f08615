export * from './types';
export * from './schemas';
export * from './errors';
export type * from './trace';
