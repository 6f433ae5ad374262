// Postgres object store (drizzle-orm over postgres.js)

export * from './db.js';
export * from './predicates.js';
export * from './rows.js';
export * from './store.js';
export * as schema from './schema/index.js';
