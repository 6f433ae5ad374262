// In-memory predicate evaluation and ordering
//
// These functions define the reference semantics for predicates and sort
// descriptors. SQL-backed stores compile to the same behavior.

import type { JsonValue, PropertyBag, Scalar } from '../types/common.js';
import type { Predicate, SortDescriptor } from '../types/predicates.js';

/**
 * Test a property bag against a predicate.
 */
export function evaluatePredicate(predicate: Predicate, properties: PropertyBag): boolean {
  switch (predicate.op) {
    case 'eq':
      return scalarEquals(read(properties, predicate.key), predicate.value);
    case 'ne':
      return !scalarEquals(read(properties, predicate.key), predicate.value);
    case 'gt':
    case 'gte':
    case 'lt':
    case 'lte': {
      const order = compareOrderable(read(properties, predicate.key), predicate.value);
      if (order === null) return false;
      if (predicate.op === 'gt') return order > 0;
      if (predicate.op === 'gte') return order >= 0;
      if (predicate.op === 'lt') return order < 0;
      return order <= 0;
    }
    case 'in': {
      const value = read(properties, predicate.key);
      return predicate.values.some((candidate) => scalarEquals(value, candidate));
    }
    case 'contains': {
      const value = read(properties, predicate.key);
      return typeof value === 'string' && value.includes(predicate.value);
    }
    case 'exists':
      return read(properties, predicate.key) !== null;
    case 'and':
      return predicate.predicates.every((p) => evaluatePredicate(p, properties));
    case 'or':
      return predicate.predicates.some((p) => evaluatePredicate(p, properties));
    case 'not':
      return !evaluatePredicate(predicate.predicate, properties);
  }
}

/**
 * Build a comparator for the given sort descriptors.
 * Returns 0 for equal keys so that a stable sort keeps store-default order.
 */
export function compareBySortDescriptors(
  sortDescriptors: readonly SortDescriptor[]
): (a: PropertyBag, b: PropertyBag) => number {
  return (a, b) => {
    for (const descriptor of sortDescriptors) {
      const order = compareValues(read(a, descriptor.key), read(b, descriptor.key));
      if (order !== 0) {
        return descriptor.direction === 'asc' ? order : -order;
      }
    }
    return 0;
  };
}

/**
 * Total order over JSON values:
 * null < string < number < boolean < array < object.
 */
export function compareValues(a: JsonValue, b: JsonValue): number {
  const rankA = typeRank(a);
  const rankB = typeRank(b);
  if (rankA !== rankB) return rankA < rankB ? -1 : 1;

  const sameType = compareSameType(a, b);
  if (sameType !== null) return sameType;

  // Arrays and objects of the same rank compare by their JSON text
  return compareScalars(JSON.stringify(a), JSON.stringify(b));
}

function read(properties: PropertyBag, key: string): JsonValue {
  return properties[key] ?? null;
}

function scalarEquals(value: JsonValue, expected: Scalar): boolean {
  return value === expected;
}

// Range comparisons only apply to two numbers or two strings
function compareOrderable(a: JsonValue, b: JsonValue): number | null {
  if (typeof a === 'number' && typeof b === 'number') return compareScalars(a, b);
  if (typeof a === 'string' && typeof b === 'string') return compareScalars(a, b);
  return null;
}

function compareSameType(a: JsonValue, b: JsonValue): number | null {
  const orderable = compareOrderable(a, b);
  if (orderable !== null) return orderable;
  if (typeof a === 'boolean' && typeof b === 'boolean') return compareScalars(Number(a), Number(b));
  if (a === null && b === null) return 0;
  return null;
}

function compareScalars<V extends string | number>(a: V, b: V): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

function typeRank(value: JsonValue): number {
  if (value === null) return 0;
  if (typeof value === 'string') return 1;
  if (typeof value === 'number') return 2;
  if (typeof value === 'boolean') return 3;
  if (Array.isArray(value)) return 4;
  return 5;
}
