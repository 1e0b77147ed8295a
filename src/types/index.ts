export * from './fact.js';
export * from './rule.js';
export * from './table.js';
export * from './engine.js';
