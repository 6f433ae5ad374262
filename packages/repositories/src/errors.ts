// Repository and store error types

import type { EntityModelValidationError, ObjectIdentifier } from '@strata/protocol';

/**
 * Base class for failures the repository reports through its failure policy.
 */
export class RepositoryError extends Error {
  readonly code: string;
  readonly entityName: string;

  constructor(code: string, entityName: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'RepositoryError';
    this.code = code;
    this.entityName = entityName;
  }
}

/**
 * The store could not execute a read or count query.
 */
export class QueryFailureError extends RepositoryError {
  constructor(entityName: string, message: string, cause?: unknown) {
    super('QUERY_FAILURE', entityName, message, { cause });
    this.name = 'QueryFailureError';
  }
}

/**
 * Staged changes could not be persisted.
 */
export class CommitFailureError extends RepositoryError {
  constructor(entityName: string, message: string, cause?: unknown) {
    super('COMMIT_FAILURE', entityName, message, { cause });
    this.name = 'CommitFailureError';
  }
}

/**
 * An identifier no longer resolves, or resolves to an object of another entity.
 */
export class IdentifierStaleError extends RepositoryError {
  readonly objectId: ObjectIdentifier;

  constructor(entityName: string, objectId: ObjectIdentifier, message: string, cause?: unknown) {
    super('IDENTIFIER_STALE', entityName, message, { cause });
    this.name = 'IdentifierStaleError';
    this.objectId = objectId;
  }
}

export type StoreErrorCode =
  | 'UNKNOWN_ENTITY'
  | 'OBJECT_NOT_FOUND'
  | 'OBJECT_DELETED'
  | 'FOREIGN_IDENTIFIER'
  | 'QUERY_FAILED'
  | 'COMMIT_FAILED'
  | 'STORE_CLOSED';

/**
 * Error raised by a store context. Repositories translate these into
 * QueryFailureError, CommitFailureError or IdentifierStaleError.
 */
export class StoreError extends Error {
  readonly code: StoreErrorCode;

  constructor(code: StoreErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'StoreError';
    this.code = code;
  }
}

/**
 * Check whether a store error means the identifier simply no longer resolves.
 */
export function isStaleIdentifierError(error: unknown): boolean {
  return (
    error instanceof StoreError &&
    (error.code === 'OBJECT_NOT_FOUND' ||
      error.code === 'OBJECT_DELETED' ||
      error.code === 'FOREIGN_IDENTIFIER')
  );
}

/**
 * A repository was requested for an entity class the store's model does not know.
 */
export class UnknownEntityError extends Error {
  readonly entityName: string;

  constructor(entityName: string) {
    super(`Entity "${entityName}" is not registered in the store's model`);
    this.name = 'UnknownEntityError';
    this.entityName = entityName;
  }
}

/**
 * The entity classes do not form a valid model.
 */
export class InvalidEntityModelError extends Error {
  readonly errors: EntityModelValidationError[];

  constructor(errors: EntityModelValidationError[]) {
    super(`Invalid entity model: ${errors.map((e) => e.message).join('; ')}`);
    this.name = 'InvalidEntityModelError';
    this.errors = errors;
  }
}

/**
 * A property of an object loaded without property values was read or written.
 */
export class FaultedObjectError extends Error {
  readonly objectId: ObjectIdentifier;

  constructor(objectId: ObjectIdentifier, key: string) {
    super(`Cannot access "${key}" on ${objectId.entityName} ${objectId.key}: loaded without property values`);
    this.name = 'FaultedObjectError';
    this.objectId = objectId;
  }
}

/**
 * A value that is not JSON was assigned to a property.
 */
export class InvalidPropertyValueError extends Error {
  readonly key: string;

  constructor(entityName: string, key: string) {
    super(`Property "${key}" of ${entityName} only accepts JSON values`);
    this.name = 'InvalidPropertyValueError';
    this.key = key;
  }
}

/**
 * Environment configuration failed validation.
 */
export class InvalidConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid store configuration: ${issues.join('; ')}`);
    this.name = 'InvalidConfigError';
    this.issues = issues;
  }
}
