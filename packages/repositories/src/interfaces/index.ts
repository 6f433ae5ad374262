// Repository and store interfaces
// These define the contracts for data access, enabling substrate independence.

export type { StoreContext } from './store-context.js';
export type { ObjectStore } from './object-store.js';
export type { EntityRepository } from './entity-repository.js';
export type {
  RepositoryContext,
  TransactionalRepositoryContext,
  TransactionFn,
} from './repository-context.js';
