// @strata/repositories
// Typed entity repositories over an object-graph store.
//
// This package defines the store contract (StoreContext, ObjectStore) and the
// one repository every entity shares (EntityRepository<T>). Stores fulfill the
// contract; repositories never depend on a particular store.
//
// Key concepts:
// - Entity classes extend ManagedObject and declare a static entityName
// - A repository is bound to one StoreContext (one unit of work) and borrows it
// - Store failures are logged, then handed to a FailurePolicy
// - RepositoryContext bundles a context, a logger and a policy for injection

export * from './interfaces/index.js';
export * from './errors.js';
export * from './logger.js';
export * from './failure-policy.js';
export * from './managed-object.js';
export * from './entity-model.js';
export * from './query-builder.js';
export * from './store-context.js';
export * from './entity-repository.js';
export * from './repository-context.js';
export * from './config.js';
export * from './open-store.js';
export * as memory from './in-memory/index.js';
export * as postgres from './postgres/index.js';
