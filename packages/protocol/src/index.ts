// @strata/protocol
// Store-agnostic types shared by every repository and store implementation:
// object identifiers, property values, predicates, queries and entity models.

export * from './types/index.js';
export * from './query/index.js';
export * from './validation/model.js';
