import { and, eq, inArray, notInArray, sql, type SQL } from 'drizzle-orm';
import type { EntityModel } from '../entity-model.js';
import { StoreError } from '../errors.js';
import type { ObjectStore, StoreContext } from '../interfaces/index.js';
import { BaseStoreContext, type ChangeSet, type RowRequest, type StoredRow } from '../store-context.js';
import { createDatabase, type Client, type Database, type DatabaseConfig } from './db.js';
import { compileOrderBy, compilePredicate } from './predicates.js';
import { parseStoredRow } from './rows.js';
import { objects } from './schema/index.js';

export type PgObjectStoreOptions = {
  /**
   * Identifies this database in object identifiers (default: "default").
   * Keep it stable: identifiers issued under another storeId do not resolve.
   */
  storeId?: string;

  /**
   * Connection to end on close(); omit when the caller owns it
   */
  client?: Client;
};

/**
 * Object store backed by the Postgres objects table.
 *
 * Usage:
 * ```ts
 * const store = PgObjectStore.connect(model, {
 *   connectionString: process.env.DATABASE_URL,
 * });
 * const notes = createEntityRepository(store.newContext(), Note);
 * ```
 */
export class PgObjectStore implements ObjectStore {
  readonly storeId: string;
  private readonly client?: Client;
  private closed = false;

  constructor(
    readonly model: EntityModel,
    private readonly db: Database,
    options: PgObjectStoreOptions = {}
  ) {
    this.storeId = options.storeId ?? 'default';
    this.client = options.client;
  }

  /**
   * Open a connection pool and a store that ends it on close()
   */
  static connect(model: EntityModel, config: DatabaseConfig & { storeId?: string }): PgObjectStore {
    const { db, client } = createDatabase(config);
    return new PgObjectStore(model, db, { storeId: config.storeId, client });
  }

  newContext(): StoreContext {
    this.assertOpen();
    return new PgStoreContext(this, this.db);
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    await this.client?.end();
  }

  assertOpen(): void {
    if (this.closed) {
      throw new StoreError('STORE_CLOSED', `Store ${this.storeId} is closed`);
    }
  }
}

/**
 * Unit of work against a PgObjectStore.
 *
 * Queries filter and order on committed property values; staged edits are
 * merged in by BaseStoreContext.
 */
export class PgStoreContext extends BaseStoreContext {
  constructor(
    private readonly store: PgObjectStore,
    private readonly db: Database
  ) {
    super(store.storeId, store.model);
  }

  protected async fetchRows(request: RowRequest): Promise<StoredRow[]> {
    const properties = request.includesPropertyValues ? sql`${objects.properties}` : sql`null`;

    let query = this.db
      .select({
        key: objects.key,
        entityName: objects.entityName,
        properties: sql<unknown>`${properties}`,
      })
      .from(objects)
      .where(and(...conditionsFor(request)))
      .orderBy(...compileOrderBy(request.sortDescriptors))
      .$dynamic();

    if (request.fetchLimit !== undefined) {
      query = query.limit(request.fetchLimit);
    }

    const rows = await query;
    return rows.map(parseStoredRow);
  }

  protected async countRows(request: RowRequest): Promise<number> {
    const [result] = await this.db
      .select({ count: sql<number>`count(*)` })
      .from(objects)
      .where(and(...conditionsFor(request)));

    return Number(result?.count ?? 0);
  }

  protected async fetchRow(key: string): Promise<StoredRow | null> {
    const [row] = await this.db
      .select({
        key: objects.key,
        entityName: objects.entityName,
        properties: objects.properties,
      })
      .from(objects)
      .where(eq(objects.key, key));

    return row ? parseStoredRow(row) : null;
  }

  protected async persist(changes: ChangeSet): Promise<void> {
    const now = new Date();

    await this.db.transaction(async (tx) => {
      if (changes.inserted.length > 0) {
        await tx.insert(objects).values(
          changes.inserted.map((row) => ({
            key: row.key,
            entityName: row.entityName,
            properties: row.properties,
            createdAt: now,
            updatedAt: now,
          }))
        );
      }

      for (const row of changes.updated) {
        const updated = await tx
          .update(objects)
          .set({ properties: row.properties, updatedAt: now })
          .where(eq(objects.key, row.key))
          .returning({ key: objects.key });

        // Throwing rolls the whole transaction back
        if (updated.length === 0) {
          throw new StoreError('COMMIT_FAILED', `${row.entityName} ${row.key} was deleted by another context`);
        }
      }

      if (changes.deleted.length > 0) {
        await tx.delete(objects).where(
          inArray(
            objects.key,
            changes.deleted.map((row) => row.key)
          )
        );
      }
    });
  }

  protected assertOpen(): void {
    this.store.assertOpen();
  }
}

function conditionsFor(request: RowRequest): SQL[] {
  const conditions = [inArray(objects.entityName, request.entityNames)];
  if (request.excludedKeys.length > 0) {
    conditions.push(notInArray(objects.key, request.excludedKeys));
  }
  if (request.predicate) {
    conditions.push(compilePredicate(request.predicate));
  }
  return conditions;
}
