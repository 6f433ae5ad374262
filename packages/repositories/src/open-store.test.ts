import { describe, it, expect } from 'vitest';
import { loadStoreConfig } from './config.js';
import { InMemoryObjectStore } from './in-memory/index.js';
import { openObjectStore } from './open-store.js';
import { PgObjectStore } from './postgres/store.js';
import { createTestModel } from './test-entities.js';

describe('openObjectStore', () => {
  it('opens an in-memory store without a database URL', async () => {
    const store = openObjectStore(createTestModel(), loadStoreConfig({ STRATA_STORE_ID: 'local' }));

    expect(store).toBeInstanceOf(InMemoryObjectStore);
    expect(store.storeId).toBe('local');
    await store.close();
  });

  it('opens a Postgres store for a database URL without connecting', async () => {
    const store = openObjectStore(
      createTestModel(),
      loadStoreConfig({ DATABASE_URL: 'postgres://localhost:5432/strata' })
    );

    expect(store).toBeInstanceOf(PgObjectStore);
    expect(store.storeId).toBe('default');
    await store.close();
  });
});
