import type { ManagedObject, EntityClass } from '../managed-object.js';
import type { EntityRepository } from './entity-repository.js';
import type { StoreContext } from './store-context.js';

/**
 * RepositoryContext bundles one StoreContext with the repositories bound to it.
 *
 * This is the primary dependency injection point: pass a RepositoryContext to
 * any code that needs data access, and every repository it hands out shares
 * the same unit of work.
 *
 * Example usage:
 * ```typescript
 * const repos = createRepositoryContext(store.newContext());
 * const notes = repos.repository(Note);
 * const note = notes.insertNewObject();
 * note.title = 'Groceries';
 * await repos.commit();
 * ```
 */
export interface RepositoryContext {
  readonly context: StoreContext;

  /**
   * Repository for one entity class, bound to this context
   */
  repository<T extends ManagedObject>(entity: EntityClass<T>): EntityRepository<T>;

  /**
   * Persist staged changes (inserts in particular, which repositories never commit)
   */
  commit(): Promise<void>;

  /**
   * Discard staged changes
   */
  rollback(): void;
}

/**
 * Function executed by RepositoryContext.transaction.
 */
export type TransactionFn<T> = (repos: RepositoryContext) => Promise<T>;

/**
 * Extended context with transaction support.
 */
export interface TransactionalRepositoryContext extends RepositoryContext {
  /**
   * Run fn, then commit. If fn or the commit throws, staged changes are
   * rolled back and the error is rethrown.
   *
   * @param fn Function to execute within the unit of work
   * @returns The return value of the function
   */
  transaction<T>(fn: TransactionFn<T>): Promise<T>;
}
