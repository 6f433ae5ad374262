import type { ObjectIdentifier, Query } from '@strata/protocol';
import type { EntityModel } from '../entity-model.js';
import type { ManagedObject } from '../managed-object.js';
import type { QueryBuilder } from '../query-builder.js';

/**
 * StoreContext is one unit of work against an object store.
 *
 * This is the narrow contract repositories consume. A context tracks the
 * objects it has handed out (one live instance per object), stages inserts
 * and deletes, and persists them on commit.
 *
 * A context is confined to its owner: it performs no locking, and concurrent
 * calls must be serialized by the caller.
 *
 * Rejections are StoreError instances.
 */
export interface StoreContext {
  /**
   * Store that issues this context's object identifiers
   */
  readonly storeId: string;

  /**
   * Entity classes known to the store
   */
  readonly model: EntityModel;

  /**
   * True while there are staged inserts, deletes or modified objects
   */
  readonly hasChanges: boolean;

  /**
   * Produce an empty query scoped to one entity.
   */
  newQuery(entityName: string): QueryBuilder;

  /**
   * Run a read query. Staged inserts are included and staged deletes hidden.
   */
  execute(query: Query): Promise<ManagedObject[]>;

  /**
   * Run a count-only query; no objects are instantiated.
   */
  count(query: Query): Promise<number>;

  /**
   * Look up one object directly by identifier.
   * Rejects with OBJECT_NOT_FOUND, OBJECT_DELETED or FOREIGN_IDENTIFIER when it
   * no longer resolves.
   */
  resolve(objectId: ObjectIdentifier): Promise<ManagedObject>;

  /**
   * Allocate a new, empty object and register it as a staged insert.
   */
  insertNew(entityName: string): ManagedObject;

  /**
   * Stage an object for removal.
   */
  markDeleted(object: ManagedObject): void;

  /**
   * Persist all staged changes at once. On failure the staged changes remain.
   */
  commit(): Promise<void>;

  /**
   * Discard staged changes and restore modified objects to their stored values.
   */
  rollback(): void;
}
