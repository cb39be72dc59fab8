export * from './loader';
export * from './defaults';
