// Predicate builders
//
// Usage:
//   and(eq('status', 'draft'), gt('wordCount', 500))
//   [descending('updatedAt'), ascending('title')]

import type { Scalar } from '../types/common.js';
import type { Predicate, SortDescriptor } from '../types/predicates.js';

export function eq(key: string, value: Scalar): Predicate {
  return { op: 'eq', key, value };
}

export function ne(key: string, value: Scalar): Predicate {
  return { op: 'ne', key, value };
}

export function gt(key: string, value: Scalar): Predicate {
  return { op: 'gt', key, value };
}

export function gte(key: string, value: Scalar): Predicate {
  return { op: 'gte', key, value };
}

export function lt(key: string, value: Scalar): Predicate {
  return { op: 'lt', key, value };
}

export function lte(key: string, value: Scalar): Predicate {
  return { op: 'lte', key, value };
}

export function isIn(key: string, values: Scalar[]): Predicate {
  return { op: 'in', key, values };
}

export function contains(key: string, value: string): Predicate {
  return { op: 'contains', key, value };
}

export function exists(key: string): Predicate {
  return { op: 'exists', key };
}

/**
 * Match when every predicate matches. No predicates matches everything.
 */
export function and(...predicates: Predicate[]): Predicate {
  return { op: 'and', predicates };
}

/**
 * Match when any predicate matches. No predicates matches nothing.
 */
export function or(...predicates: Predicate[]): Predicate {
  return { op: 'or', predicates };
}

export function not(predicate: Predicate): Predicate {
  return { op: 'not', predicate };
}

export function ascending(key: string): SortDescriptor {
  return { key, direction: 'asc' };
}

export function descending(key: string): SortDescriptor {
  return { key, direction: 'desc' };
}
