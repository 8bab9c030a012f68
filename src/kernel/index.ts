export * from './diagnostic-codes.js';
export * from './diagnostics.js';
export * from './field-tree.js';
export * from './spec-error.js';
export * from './types.js';
export * from './validation-result.js';
