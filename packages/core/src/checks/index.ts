export * from './types';
export * from './native';
export * from './custom';
export * from './coverage';
export * from './dispatch';
