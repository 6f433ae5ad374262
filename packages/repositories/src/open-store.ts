import type { StoreConfig } from './config.js';
import type { EntityModel } from './entity-model.js';
import { InMemoryObjectStore } from './in-memory/index.js';
import type { ObjectStore } from './interfaces/index.js';
import { PgObjectStore } from './postgres/store.js';

/**
 * Open the store the configuration selects: Postgres when a database URL is
 * set, in-memory otherwise.
 */
export function openObjectStore(model: EntityModel, config: StoreConfig): ObjectStore {
  if (!config.databaseUrl) {
    return new InMemoryObjectStore(model, { storeId: config.storeId });
  }

  return PgObjectStore.connect(model, {
    connectionString: config.databaseUrl,
    maxConnections: config.maxConnections,
    storeId: config.storeId,
  });
}
