export * from './types';
export * from './fields';
export * from './normalize';
export * from './parse';
