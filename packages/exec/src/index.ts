export * from './runner/types';
export * from './runner/runner';
export * from './fake/executor';
