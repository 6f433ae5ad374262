// QueryBuilder - assembles a Query for one entity

import type { Predicate, Query, SortDescriptor, SortDirection } from '@strata/protocol';

/**
 * Fluent builder for a single Query.
 *
 * Stores hand out builders through StoreContext.newQuery(entityName), so the
 * entity name is fixed when the builder is created.
 *
 * @example
 * ```ts
 * const query = context
 *   .newQuery('Note')
 *   .where(eq('pinned', true))
 *   .orderBy('updatedAt', 'desc')
 *   .limit(10)
 *   .build();
 * ```
 */
export class QueryBuilder {
  private predicate?: Predicate;
  private sortDescriptors: SortDescriptor[] = [];
  private fetchLimit?: number;
  private subentities = true;
  private propertyValues = true;

  constructor(readonly entityName: string) {}

  /**
   * Set the predicate; undefined matches everything
   */
  where(predicate: Predicate | undefined): this {
    this.predicate = predicate;
    return this;
  }

  orderBy(key: string, direction: SortDirection = 'asc'): this {
    this.sortDescriptors.push({ key, direction });
    return this;
  }

  /**
   * Replace the ordering; undefined restores store-default order
   */
  sortedBy(sortDescriptors: readonly SortDescriptor[] | undefined): this {
    this.sortDescriptors = sortDescriptors ? [...sortDescriptors] : [];
    return this;
  }

  /**
   * @throws RangeError unless n is a positive integer
   */
  limit(n: number): this {
    if (!Number.isInteger(n) || n < 1) {
      throw new RangeError(`Fetch limit must be a positive integer, got ${n}`);
    }
    this.fetchLimit = n;
    return this;
  }

  includesSubentities(include: boolean): this {
    this.subentities = include;
    return this;
  }

  includesPropertyValues(include: boolean): this {
    this.propertyValues = include;
    return this;
  }

  build(): Query {
    return Object.freeze({
      entityName: this.entityName,
      predicate: this.predicate,
      sortDescriptors: Object.freeze([...this.sortDescriptors]),
      fetchLimit: this.fetchLimit,
      includesSubentities: this.subentities,
      includesPropertyValues: this.propertyValues,
    });
  }
}
