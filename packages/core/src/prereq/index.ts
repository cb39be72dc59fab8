export * from './types';
export * from './fetcher';
export * from './builtin';
export * from './verifier';
