// BaseStoreContext - unit-of-work bookkeeping shared by every store
//
// Subclasses only move rows in and out of their backend. This class keeps the
// identity map, stages inserts and deletes, merges staged changes into query
// results, and turns the staged state into one ChangeSet on commit.

import { randomUUID } from 'node:crypto';
import {
  compareBySortDescriptors,
  evaluatePredicate,
  formatObjectIdentifier,
  type ObjectIdentifier,
  type Predicate,
  type PropertyBag,
  type Query,
  type SortDescriptor,
} from '@strata/protocol';
import type { EntityModel } from './entity-model.js';
import { StoreError, type StoreErrorCode } from './errors.js';
import type { StoreContext } from './interfaces/index.js';
import type { ManagedObject } from './managed-object.js';
import { QueryBuilder } from './query-builder.js';

/**
 * A row as read from a backend. Properties are null for identity-only reads.
 */
export type StoredRow = {
  key: string;
  entityName: string;
  properties: PropertyBag | null;
};

/**
 * A row as written to a backend
 */
export type PersistedRow = {
  key: string;
  entityName: string;
  properties: PropertyBag;
};

/**
 * What a backend needs to answer a query
 */
export type RowRequest = {
  /**
   * The queried entity, followed by its sub-entities when included
   */
  entityNames: string[];
  predicate?: Predicate;
  sortDescriptors: readonly SortDescriptor[];
  fetchLimit?: number;
  includesPropertyValues: boolean;

  /**
   * Keys of objects staged for deletion; backends leave these rows out
   */
  excludedKeys: string[];
};

/**
 * Everything one commit writes. Backends apply it atomically.
 */
export type ChangeSet = {
  inserted: PersistedRow[];
  updated: PersistedRow[];
  deleted: Array<{ key: string; entityName: string }>;
};

type Registration = {
  object: ManagedObject;

  /**
   * Property values as last read from or written to the backend; null for faults
   */
  stored: PropertyBag | null;
};

export abstract class BaseStoreContext implements StoreContext {
  private readonly registered = new Map<string, Registration>();
  private readonly inserted = new Map<string, ManagedObject>();
  private readonly deleted = new Map<string, ManagedObject>();

  constructor(
    readonly storeId: string,
    readonly model: EntityModel
  ) {}

  /**
   * Rows matching the request, ordered, limited when fetchLimit is set
   */
  protected abstract fetchRows(request: RowRequest): Promise<StoredRow[]>;

  protected abstract countRows(request: RowRequest): Promise<number>;

  protected abstract fetchRow(key: string): Promise<StoredRow | null>;

  /**
   * Write a change set atomically: all of it or none of it
   */
  protected abstract persist(changes: ChangeSet): Promise<void>;

  /**
   * @throws StoreError with code STORE_CLOSED once the backend is closed
   */
  protected abstract assertOpen(): void;

  protected generateKey(): string {
    return randomUUID();
  }

  get hasChanges(): boolean {
    if (this.inserted.size > 0 || this.deleted.size > 0) return true;
    for (const registration of this.registered.values()) {
      if (isModified(registration)) return true;
    }
    return false;
  }

  newQuery(entityName: string): QueryBuilder {
    return new QueryBuilder(entityName);
  }

  async execute(query: Query): Promise<ManagedObject[]> {
    const request = this.rowRequest(query);
    const pending = this.inserted.size > 0;

    // Staged inserts shift what the limit cuts off, so it is applied after merging
    const rows = await this.backend('QUERY_FAILED', () =>
      this.fetchRows(pending ? { ...request, fetchLimit: undefined } : request)
    );

    const objects = rows.map((row) => this.register(row));
    if (!pending) return objects;

    for (const object of this.inserted.values()) {
      if (matches(object, request)) objects.push(object);
    }

    const ordered =
      request.sortDescriptors.length > 0 ? sortObjects(objects, request.sortDescriptors) : objects;
    return request.fetchLimit === undefined ? ordered : ordered.slice(0, request.fetchLimit);
  }

  async count(query: Query): Promise<number> {
    const request = this.rowRequest(query);
    let total = await this.backend('QUERY_FAILED', () => this.countRows(request));

    for (const object of this.inserted.values()) {
      if (matches(object, request)) total++;
    }
    return total;
  }

  async resolve(objectId: ObjectIdentifier): Promise<ManagedObject> {
    this.assertOpen();
    this.assertOwnIdentifier(objectId);

    const uri = formatObjectIdentifier(objectId);
    if (this.deleted.has(uri)) {
      throw new StoreError('OBJECT_DELETED', `${uri} is staged for deletion`);
    }
    const inserted = this.inserted.get(uri);
    if (inserted) return inserted;

    // Always consult the backend: another context may have deleted the row
    const row = await this.backend('QUERY_FAILED', () => this.fetchRow(objectId.key));
    if (!row || row.entityName !== objectId.entityName) {
      this.registered.delete(uri);
      throw new StoreError('OBJECT_NOT_FOUND', `${uri} no longer exists`);
    }
    return this.register(row);
  }

  insertNew(entityName: string): ManagedObject {
    this.assertOpen();
    if (!this.model.has(entityName)) {
      throw new StoreError('UNKNOWN_ENTITY', `Unknown entity "${entityName}"`);
    }

    const objectId: ObjectIdentifier = { storeId: this.storeId, entityName, key: this.generateKey() };
    const object = this.model.instantiate(objectId, {});
    this.inserted.set(formatObjectIdentifier(objectId), object);
    return object;
  }

  markDeleted(object: ManagedObject): void {
    this.assertOpen();
    this.assertOwnIdentifier(object.objectId);

    const uri = formatObjectIdentifier(object.objectId);
    // An uncommitted insert never reached the backend
    if (this.inserted.get(uri) === object) {
      this.inserted.delete(uri);
      return;
    }

    if (this.registered.get(uri)?.object !== object) {
      throw new StoreError('OBJECT_NOT_FOUND', `${uri} is not registered in this context`);
    }
    this.deleted.set(uri, object);
  }

  async commit(): Promise<void> {
    this.assertOpen();

    const changes = this.collectChanges();
    if (changes.inserted.length === 0 && changes.updated.length === 0 && changes.deleted.length === 0) {
      return;
    }

    await this.backend('COMMIT_FAILED', () => this.persist(changes));

    for (const row of [...changes.inserted, ...changes.updated]) {
      const uri = this.uriFor(row.entityName, row.key);
      const object = this.inserted.get(uri) ?? this.registered.get(uri)?.object;
      if (object) {
        this.registered.set(uri, { object, stored: row.properties });
      }
    }
    for (const row of changes.deleted) {
      this.registered.delete(this.uriFor(row.entityName, row.key));
    }
    this.inserted.clear();
    this.deleted.clear();
  }

  rollback(): void {
    this.inserted.clear();
    this.deleted.clear();
    for (const registration of this.registered.values()) {
      if (registration.stored !== null && isModified(registration)) {
        registration.object.hydrate(registration.stored);
      }
    }
  }

  private collectChanges(): ChangeSet {
    const inserted = [...this.inserted.values()].map(toPersistedRow);

    const updated: PersistedRow[] = [];
    for (const [uri, registration] of this.registered) {
      if (this.deleted.has(uri) || !isModified(registration)) continue;
      updated.push(toPersistedRow(registration.object));
    }

    const deleted = [...this.deleted.values()].map((object) => ({
      key: object.objectId.key,
      entityName: object.entityName,
    }));

    return { inserted, updated, deleted };
  }

  private register(row: StoredRow): ManagedObject {
    const uri = this.uriFor(row.entityName, row.key);
    const existing = this.registered.get(uri);

    if (existing) {
      // Keep in-memory edits; only fill in faults
      if (existing.object.isFault && row.properties !== null) {
        existing.object.hydrate(row.properties);
        existing.stored = row.properties;
      }
      return existing.object;
    }

    const objectId: ObjectIdentifier = { storeId: this.storeId, entityName: row.entityName, key: row.key };
    const object = this.model.instantiate(objectId, row.properties);
    this.registered.set(uri, { object, stored: row.properties });
    return object;
  }

  private rowRequest(query: Query): RowRequest {
    this.assertOpen();
    if (!this.model.has(query.entityName)) {
      throw new StoreError('UNKNOWN_ENTITY', `Unknown entity "${query.entityName}"`);
    }

    return {
      entityNames: this.model.entityNamesFor(query.entityName, query.includesSubentities),
      predicate: query.predicate,
      sortDescriptors: query.sortDescriptors,
      fetchLimit: query.fetchLimit,
      includesPropertyValues: query.includesPropertyValues,
      excludedKeys: [...this.deleted.values()].map((object) => object.objectId.key),
    };
  }

  private assertOwnIdentifier(objectId: ObjectIdentifier): void {
    if (objectId.storeId !== this.storeId) {
      throw new StoreError(
        'FOREIGN_IDENTIFIER',
        `${formatObjectIdentifier(objectId)} was issued by another store`
      );
    }
  }

  private uriFor(entityName: string, key: string): string {
    return formatObjectIdentifier({ storeId: this.storeId, entityName, key });
  }

  /**
   * Run a backend call, wrapping anything but a StoreError under the given code.
   */
  private async backend<R>(code: StoreErrorCode, call: () => Promise<R>): Promise<R> {
    try {
      return await call();
    } catch (error) {
      if (error instanceof StoreError) throw error;
      const reason = error instanceof Error ? error.message : String(error);
      throw new StoreError(code, `Store ${this.storeId}: ${reason}`, { cause: error });
    }
  }
}

function isModified(registration: Registration): boolean {
  if (registration.stored === null || registration.object.isFault) return false;
  return JSON.stringify(registration.object.properties()) !== JSON.stringify(registration.stored);
}

function matches(object: ManagedObject, request: RowRequest): boolean {
  if (!request.entityNames.includes(object.entityName)) return false;
  return request.predicate === undefined || evaluatePredicate(request.predicate, object.properties());
}

function sortObjects(objects: ManagedObject[], sortDescriptors: readonly SortDescriptor[]): ManagedObject[] {
  const compare = compareBySortDescriptors(sortDescriptors);
  return objects
    .map((object) => ({ object, properties: object.properties() }))
    .sort((a, b) => compare(a.properties, b.properties))
    .map(({ object }) => object);
}

function toPersistedRow(object: ManagedObject): PersistedRow {
  return {
    key: object.objectId.key,
    entityName: object.entityName,
    properties: object.properties(),
  };
}
