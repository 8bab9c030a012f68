export * from './consistency-validator.js';
export * from './hard-code-rule.js';
export * from './message-validator.js';
export * from './projections.js';
