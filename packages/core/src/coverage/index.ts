export * from './types';
export * from './profile';
export * from './aggregator';
export * from './format';
export * from './reporter';
