export * from './build-message-model.js';
export * from './diagnostic-limits.js';
export * from './field-specs.js';
export * from './naming.js';
export * from './serde.js';
export * from './spec-rows.js';
