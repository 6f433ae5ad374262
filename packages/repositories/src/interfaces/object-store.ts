import type { EntityModel } from '../entity-model.js';
import type { StoreContext } from './store-context.js';

/**
 * An object store hands out units of work.
 * Contexts opened from one store see each other's committed changes.
 */
export interface ObjectStore {
  readonly storeId: string;
  readonly model: EntityModel;

  /**
   * Open a new, empty unit of work
   */
  newContext(): StoreContext;

  /**
   * Release the store's resources. Contexts fail with STORE_CLOSED afterwards.
   */
  close(): Promise<void>;
}
