export const name = '@precheck/core';

export * from './config';
export * from './coverage';
export * from './prereq';
export * from './checks';
export * from './mode';
