// Re-export all protocol types

export * from './common.js';
export * from './identifiers.js';
export * from './predicates.js';
export * from './queries.js';
export * from './model.js';
