import { pgTable, bigserial, text, timestamp, jsonb, index } from 'drizzle-orm/pg-core';
import type { PropertyBag } from '@strata/protocol';

/**
 * Objects table - every persisted object of every entity.
 *
 * Sub-entities share the table with their parents; entity_name tells them
 * apart. seq records insertion order, which is the store-default ordering.
 */
export const objects = pgTable(
  'objects',
  {
    seq: bigserial('seq', { mode: 'number' }).notNull(),
    key: text('key').primaryKey(),
    entityName: text('entity_name').notNull(), // e.g., "Note", "Checklist"
    properties: jsonb('properties').$type<PropertyBag>().notNull().default({}),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
    updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [
    index('objects_entity_name_idx').on(table.entityName),
    index('objects_entity_seq_idx').on(table.entityName, table.seq),
  ]
);
