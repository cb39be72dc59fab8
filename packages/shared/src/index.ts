export const name = '@precheck/shared';

export * from './types/events';
export * from './types/checks';
export * from './logger';
export * from './errors';
export * from './config/schema';
export * from './fs/path';
export * from './concurrency';
