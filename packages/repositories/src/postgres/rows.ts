// Validation of rows read back from Postgres

import { z } from 'zod';
import type { JsonValue, PropertyBag } from '@strata/protocol';
import type { StoredRow } from '../store-context.js';

const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number().finite(),
    z.boolean(),
    z.null(),
    z.array(jsonValueSchema),
    z.record(jsonValueSchema),
  ])
);

export const propertyBagSchema: z.ZodType<PropertyBag> = z.record(jsonValueSchema);

export const storedRowSchema: z.ZodType<StoredRow> = z.object({
  key: z.string().min(1),
  entityName: z.string().min(1),
  properties: propertyBagSchema.nullable(),
});

/**
 * Validate a selected row.
 *
 * @throws ZodError when the row does not have the shape of an objects row
 */
export function parseStoredRow(row: unknown): StoredRow {
  return storedRowSchema.parse(row);
}
