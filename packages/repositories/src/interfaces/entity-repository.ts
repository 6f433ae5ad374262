import type { ObjectIdentifier, Predicate, SortDescriptor } from '@strata/protocol';
import type { ManagedObject } from '../managed-object.js';
import type { QueryBuilder } from '../query-builder.js';

/**
 * Repository interface for one entity.
 *
 * Every entity class gets the same operations through this interface, bound to
 * one StoreContext. Store failures never surface as rejections from read
 * operations; they are logged and handed to the repository's FailurePolicy,
 * which decides whether they escalate.
 */
export interface EntityRepository<T extends ManagedObject> {
  /**
   * Name of the entity this repository serves
   */
  readonly entityName: string;

  /**
   * An empty query builder scoped to this entity
   */
  newQuery(): QueryBuilder;

  /**
   * All objects matching the predicate (all objects when omitted), in the
   * given order or store-default order.
   * Returns an empty list when the store fails.
   */
  allObjects(predicate?: Predicate, sortDescriptors?: readonly SortDescriptor[]): Promise<T[]>;

  /**
   * Number of objects matching the predicate, excluding sub-entities.
   * A store failure is fatal under the default policy; otherwise 0.
   */
  countObjects(predicate?: Predicate): Promise<number>;

  /**
   * The first object matching the predicate, or null
   */
  firstObject(predicate: Predicate): Promise<T | null>;

  /**
   * Insert a new, empty object. Does NOT commit: callers batch inserts and
   * commit the context once.
   */
  insertNewObject(): T;

  /**
   * Delete the object and commit immediately.
   */
  deleteObject(object: T): Promise<void>;

  /**
   * Delete every object of this entity (sub-entities excluded) and commit once.
   */
  deleteAllObjects(): Promise<void>;

  /**
   * Resolve an identifier to an object of this entity.
   * Stale identifiers and objects of other entities yield null.
   */
  loadObject(objectId: ObjectIdentifier): Promise<T | null>;
}
