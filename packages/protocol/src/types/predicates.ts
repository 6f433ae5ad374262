// Predicate and ordering types
//
// Predicates are plain data so that every store can interpret them:
// the in-memory store evaluates them directly, the Postgres store compiles
// them to SQL.

import type { Scalar } from './common.js';

export type ComparisonOperator = 'eq' | 'ne' | 'gt' | 'gte' | 'lt' | 'lte';

/**
 * Compare one property against a scalar.
 * A missing property reads as null.
 */
export type ComparisonPredicate = {
  op: ComparisonOperator;
  key: string;
  value: Scalar;
};

/**
 * Match when the property equals one of the values
 */
export type MembershipPredicate = {
  op: 'in';
  key: string;
  values: Scalar[];
};

/**
 * Case-sensitive substring test on a string property
 */
export type ContainsPredicate = {
  op: 'contains';
  key: string;
  value: string;
};

/**
 * Match when the property is present and not null
 */
export type ExistsPredicate = {
  op: 'exists';
  key: string;
};

export type CompoundPredicate = {
  op: 'and' | 'or';
  predicates: Predicate[];
};

export type NegatedPredicate = {
  op: 'not';
  predicate: Predicate;
};

export type Predicate =
  | ComparisonPredicate
  | MembershipPredicate
  | ContainsPredicate
  | ExistsPredicate
  | CompoundPredicate
  | NegatedPredicate;

export type SortDirection = 'asc' | 'desc';

/**
 * Order results by one property
 */
export type SortDescriptor = {
  key: string;
  direction: SortDirection;
};
