import { createEntityRepository, type EntityRepositoryOptions } from './entity-repository.js';
import type {
  EntityRepository,
  StoreContext,
  TransactionalRepositoryContext,
  TransactionFn,
} from './interfaces/index.js';
import type { EntityClass, ManagedObject } from './managed-object.js';

/**
 * Create a TransactionalRepositoryContext over one StoreContext.
 *
 * Usage:
 * ```ts
 * const repos = createRepositoryContext(store.newContext(), repositoryOptionsFromConfig(config));
 *
 * const note = await repos.transaction(async (tx) => {
 *   const note = tx.repository(Note).insertNewObject();
 *   note.title = 'Groceries';
 *   return note;
 * });
 * ```
 *
 * Operations that commit on their own (deleteObject, deleteAllObjects) are not
 * undone by a later rollback.
 */
export function createRepositoryContext(
  context: StoreContext,
  options: EntityRepositoryOptions = {}
): TransactionalRepositoryContext {
  const repos: TransactionalRepositoryContext = {
    context,

    repository<T extends ManagedObject>(entity: EntityClass<T>): EntityRepository<T> {
      return createEntityRepository(context, entity, options);
    },

    commit() {
      return context.commit();
    },

    rollback() {
      context.rollback();
    },

    async transaction<T>(fn: TransactionFn<T>): Promise<T> {
      try {
        const result = await fn(repos);
        await context.commit();
        return result;
      } catch (error) {
        context.rollback();
        throw error;
      }
    },
  };

  return repos;
}
