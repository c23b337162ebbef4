export * from './types';
export * from './effect';
export * from './factory';
export * from './registry';
