export * from './kernel/index.js';
export * from './ir/index.js';
export * from './layout/index.js';
export * from './validate/index.js';
export * from './pipeline/index.js';
