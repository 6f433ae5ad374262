// In-memory object store for development and testing
//
// This module provides a complete in-memory implementation of the store
// contract, useful for:
// - Local development without a database
// - Fast unit testing
//
// Data does not persist between restarts.

import { randomUUID } from 'node:crypto';
import { clonePropertyBag, compareBySortDescriptors, evaluatePredicate } from '@strata/protocol';
import type { EntityModel } from '../entity-model.js';
import { StoreError } from '../errors.js';
import type { ObjectStore, StoreContext } from '../interfaces/index.js';
import {
  BaseStoreContext,
  type ChangeSet,
  type PersistedRow,
  type RowRequest,
  type StoredRow,
} from '../store-context.js';

/**
 * Object store that keeps committed rows in a Map, in insertion order.
 *
 * Every context opened from the store sees the other contexts' committed
 * changes, never their staged ones. Values are deep-copied across the commit
 * boundary so no two contexts share an instance.
 *
 * @example
 * ```typescript
 * const store = new InMemoryObjectStore(EntityModel.fromClasses([Note]));
 * const repos = createRepositoryContext(store.newContext());
 *
 * // Inspect committed data
 * console.log(store.size);
 *
 * // Clear all data
 * store.clear();
 * ```
 */
export class InMemoryObjectStore implements ObjectStore {
  readonly storeId: string;
  private readonly rows = new Map<string, PersistedRow>();
  private closed = false;

  constructor(
    readonly model: EntityModel,
    options: { storeId?: string } = {}
  ) {
    this.storeId = options.storeId ?? randomUUID();
  }

  newContext(): StoreContext {
    this.assertOpen();
    return new InMemoryStoreContext(this);
  }

  async close(): Promise<void> {
    this.closed = true;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Number of committed rows
   */
  get size(): number {
    return this.rows.size;
  }

  /**
   * Clear all data
   */
  clear(): void {
    this.rows.clear();
  }

  assertOpen(): void {
    if (this.closed) {
      throw new StoreError('STORE_CLOSED', `Store ${this.storeId} is closed`);
    }
  }

  selectRows(request: RowRequest): StoredRow[] {
    let selected = this.matchingRows(request);

    if (request.sortDescriptors.length > 0) {
      const compare = compareBySortDescriptors(request.sortDescriptors);
      selected = [...selected].sort((a, b) => compare(a.properties, b.properties));
    }
    if (request.fetchLimit !== undefined) {
      selected = selected.slice(0, request.fetchLimit);
    }

    return selected.map((row) => ({
      key: row.key,
      entityName: row.entityName,
      properties: request.includesPropertyValues ? clonePropertyBag(row.properties) : null,
    }));
  }

  countRows(request: RowRequest): number {
    return this.matchingRows(request).length;
  }

  selectRow(key: string): StoredRow | null {
    const row = this.rows.get(key);
    return row ? { ...row, properties: clonePropertyBag(row.properties) } : null;
  }

  /**
   * Apply a change set. Nothing is written unless every change applies.
   */
  applyChanges(changes: ChangeSet): void {
    for (const row of changes.inserted) {
      if (this.rows.has(row.key)) {
        throw new StoreError('COMMIT_FAILED', `Duplicate key ${row.key}`);
      }
    }
    for (const row of changes.updated) {
      if (!this.rows.has(row.key)) {
        throw new StoreError('COMMIT_FAILED', `${row.entityName} ${row.key} was deleted by another context`);
      }
    }

    for (const row of changes.inserted) {
      this.rows.set(row.key, copyRow(row));
    }
    for (const row of changes.updated) {
      // Map.set on an existing key keeps its insertion position
      this.rows.set(row.key, copyRow(row));
    }
    for (const row of changes.deleted) {
      this.rows.delete(row.key);
    }
  }

  private matchingRows(request: RowRequest): PersistedRow[] {
    const { entityNames, predicate } = request;
    const excluded = new Set(request.excludedKeys);
    return [...this.rows.values()].filter(
      (row) =>
        entityNames.includes(row.entityName) &&
        !excluded.has(row.key) &&
        (predicate === undefined || evaluatePredicate(predicate, row.properties))
    );
  }
}

/**
 * Unit of work against an InMemoryObjectStore
 */
export class InMemoryStoreContext extends BaseStoreContext {
  constructor(private readonly store: InMemoryObjectStore) {
    super(store.storeId, store.model);
  }

  protected async fetchRows(request: RowRequest): Promise<StoredRow[]> {
    return this.store.selectRows(request);
  }

  protected async countRows(request: RowRequest): Promise<number> {
    return this.store.countRows(request);
  }

  protected async fetchRow(key: string): Promise<StoredRow | null> {
    return this.store.selectRow(key);
  }

  protected async persist(changes: ChangeSet): Promise<void> {
    this.store.applyChanges(changes);
  }

  protected assertOpen(): void {
    this.store.assertOpen();
  }
}

function copyRow(row: PersistedRow): PersistedRow {
  return { key: row.key, entityName: row.entityName, properties: clonePropertyBag(row.properties) };
}
