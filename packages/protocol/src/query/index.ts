export * from './predicates.js';
export * from './evaluate.js';
