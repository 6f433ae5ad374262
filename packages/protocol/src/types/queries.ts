// Query descriptors

import type { Predicate, SortDescriptor } from './predicates.js';

/**
 * A request for objects of one entity.
 *
 * Queries are built fresh for every call and never reused. The entity name
 * always comes from the entity class a repository is bound to.
 */
export type Query = {
  readonly entityName: string;

  /**
   * Conditions objects must meet; absent matches everything
   */
  readonly predicate?: Predicate;

  /**
   * Result ordering; empty means store-default order
   */
  readonly sortDescriptors: readonly SortDescriptor[];

  /**
   * Maximum number of results
   */
  readonly fetchLimit?: number;

  /**
   * Include objects of entities that inherit from entityName
   */
  readonly includesSubentities: boolean;

  /**
   * Load property values. When false, objects come back as faults carrying
   * only their identity.
   */
  readonly includesPropertyValues: boolean;
};
