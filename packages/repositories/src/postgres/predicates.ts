// Predicate and ordering compilation to Postgres jsonb SQL
//
// Mirrors evaluatePredicate / compareValues from @strata/protocol:
// - a missing property reads as jsonb null
// - range comparisons only match two numbers or two strings
// - jsonb ordering ranks scalars null < string < number < boolean, as compareValues does
//
// Arrays and objects order differently: jsonb compares them by length before
// content and sorts an empty top-level array before null, while compareValues
// ranks them after booleans and compares their JSON text.

import { asc, desc, sql, type SQL } from 'drizzle-orm';
import type { Predicate, Scalar, SortDescriptor } from '@strata/protocol';
import { objects } from './schema/index.js';

export function compilePredicate(predicate: Predicate): SQL {
  switch (predicate.op) {
    case 'eq':
      return sql`${property(predicate.key)} = ${jsonb(predicate.value)}`;
    case 'ne':
      return sql`${property(predicate.key)} <> ${jsonb(predicate.value)}`;
    case 'gt':
    case 'gte':
    case 'lt':
    case 'lte':
      return compileRange(predicate.op, predicate.key, predicate.value);
    case 'in':
      if (predicate.values.length === 0) return sql`false`;
      return sql`${property(predicate.key)} in (${sql.join(predicate.values.map(jsonb), sql`, `)})`;
    case 'contains':
      return sql`(jsonb_typeof(${property(predicate.key)}) = 'string' and strpos(${objects.properties} ->> ${predicate.key}::text, ${predicate.value}::text) > 0)`;
    case 'exists':
      return sql`${property(predicate.key)} <> 'null'::jsonb`;
    case 'and':
      if (predicate.predicates.length === 0) return sql`true`;
      return sql`(${sql.join(predicate.predicates.map(compilePredicate), sql` and `)})`;
    case 'or':
      if (predicate.predicates.length === 0) return sql`false`;
      return sql`(${sql.join(predicate.predicates.map(compilePredicate), sql` or `)})`;
    case 'not':
      return sql`not (${compilePredicate(predicate.predicate)})`;
  }
}

/**
 * ORDER BY terms for the sort descriptors, with insertion order as tiebreaker
 */
export function compileOrderBy(sortDescriptors: readonly SortDescriptor[]): SQL[] {
  const terms = sortDescriptors.map((descriptor) =>
    descriptor.direction === 'asc' ? asc(property(descriptor.key)) : desc(property(descriptor.key))
  );
  return [...terms, asc(objects.seq)];
}

const RANGE_OPERATORS = {
  gt: sql`>`,
  gte: sql`>=`,
  lt: sql`<`,
  lte: sql`<=`,
} as const;

function compileRange(op: keyof typeof RANGE_OPERATORS, key: string, value: Scalar): SQL {
  if (typeof value !== 'number' && typeof value !== 'string') return sql`false`;
  const type = typeof value;
  return sql`(jsonb_typeof(${property(key)}) = ${type} and ${property(key)} ${RANGE_OPERATORS[op]} ${jsonb(value)})`;
}

function property(key: string): SQL {
  return sql`coalesce(${objects.properties} -> ${key}::text, 'null'::jsonb)`;
}

function jsonb(value: Scalar): SQL {
  return sql`${JSON.stringify(value)}::jsonb`;
}
