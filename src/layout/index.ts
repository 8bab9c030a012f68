export * from './compute-layout.js';
export * from './offset-table.js';
