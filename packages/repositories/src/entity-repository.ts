// EntityRepository implementation bound to one StoreContext

import {
  formatObjectIdentifier,
  type ObjectIdentifier,
  type Predicate,
  type Query,
  type SortDescriptor,
} from '@strata/protocol';
import {
  CommitFailureError,
  IdentifierStaleError,
  QueryFailureError,
  UnknownEntityError,
  isStaleIdentifierError,
  type RepositoryError,
} from './errors.js';
import {
  escalatingFailurePolicy,
  severityOf,
  type FailurePolicy,
  type RepositoryOperation,
} from './failure-policy.js';
import type { EntityRepository, StoreContext } from './interfaces/index.js';
import { consoleLogger, type RepositoryLogger } from './logger.js';
import type { EntityClass, ManagedObject } from './managed-object.js';
import type { QueryBuilder } from './query-builder.js';

export type EntityRepositoryOptions = {
  /**
   * Logger for store failures (default: console)
   */
  logger?: RepositoryLogger;

  /**
   * Decides whether failures escalate (default: escalatingFailurePolicy)
   */
  failurePolicy?: FailurePolicy;
};

/**
 * Create a repository for one entity class, bound to a context.
 *
 * Usage:
 * ```ts
 * const notes = createEntityRepository(store.newContext(), Note);
 * const pinned = await notes.allObjects(eq('pinned', true), [descending('updatedAt')]);
 * ```
 *
 * @throws UnknownEntityError when the store's model does not register the class
 */
export function createEntityRepository<T extends ManagedObject>(
  context: StoreContext,
  entity: EntityClass<T>,
  options: EntityRepositoryOptions = {}
): EntityRepository<T> {
  return new ContextEntityRepository(context, entity, options);
}

/**
 * Uniform typed access to one entity collection through one StoreContext.
 *
 * The repository borrows the context; it never closes it and caches nothing
 * between calls. Every query is built from the entity class's own name.
 */
export class ContextEntityRepository<T extends ManagedObject> implements EntityRepository<T> {
  private readonly logger: RepositoryLogger;
  private readonly failurePolicy: FailurePolicy;

  constructor(
    private readonly context: StoreContext,
    private readonly entity: EntityClass<T>,
    options: EntityRepositoryOptions = {}
  ) {
    if (context.model.classFor(entity.entityName) !== entity) {
      throw new UnknownEntityError(entity.entityName);
    }
    this.logger = options.logger ?? consoleLogger;
    this.failurePolicy = options.failurePolicy ?? escalatingFailurePolicy;
  }

  get entityName(): string {
    return this.entity.entityName;
  }

  newQuery(): QueryBuilder {
    return this.context.newQuery(this.entityName);
  }

  async allObjects(predicate?: Predicate, sortDescriptors?: readonly SortDescriptor[]): Promise<T[]> {
    const query = this.newQuery().where(predicate).sortedBy(sortDescriptors).build();
    return this.loadObjects(query, 'allObjects');
  }

  async countObjects(predicate?: Predicate): Promise<number> {
    const query = this.newQuery().where(predicate).includesSubentities(false).build();

    try {
      return await this.context.count(query);
    } catch (error) {
      this.fail(
        'countObjects',
        new QueryFailureError(this.entityName, `Error counting objects [${this.entityName}]`, error)
      );
      return 0;
    }
  }

  async firstObject(predicate: Predicate): Promise<T | null> {
    const query = this.newQuery().where(predicate).limit(1).build();
    const [first] = await this.loadObjects(query, 'firstObject');
    return first ?? null;
  }

  insertNewObject(): T {
    const object = this.cast(this.context.insertNew(this.entityName));
    if (!object) {
      // The constructor checked that the model maps this name to our class
      throw new UnknownEntityError(this.entityName);
    }
    return object;
  }

  async deleteObject(object: T): Promise<void> {
    try {
      this.context.markDeleted(object);
      await this.context.commit();
    } catch (error) {
      this.fail(
        'deleteObject',
        new CommitFailureError(this.entityName, `Error deleting entity [${this.entityName}]`, error)
      );
    }
  }

  async deleteAllObjects(): Promise<void> {
    const query = this.newQuery().includesPropertyValues(false).includesSubentities(false).build();
    const objects = await this.loadObjects(query, 'deleteAllObjects');

    try {
      for (const object of objects) {
        this.context.markDeleted(object);
      }
      await this.context.commit();
    } catch (error) {
      this.fail(
        'deleteAllObjects',
        new CommitFailureError(
          this.entityName,
          `Error deleting all entities of kind [${this.entityName}]`,
          error
        )
      );
    }
  }

  async loadObject(objectId: ObjectIdentifier): Promise<T | null> {
    let resolved: ManagedObject;
    try {
      resolved = await this.context.resolve(objectId);
    } catch (error) {
      const failure = isStaleIdentifierError(error)
        ? new IdentifierStaleError(this.entityName, objectId, `Error loading Object [${this.entityName}]`, error)
        : new QueryFailureError(this.entityName, `Error loading Object [${this.entityName}]`, error);
      this.fail('loadObject', failure);
      return null;
    }

    const object = this.cast(resolved);
    if (!object) {
      this.fail(
        'loadObject',
        new IdentifierStaleError(
          this.entityName,
          objectId,
          `Object ${formatObjectIdentifier(objectId)} is a ${resolved.entityName}, not a ${this.entityName}`
        )
      );
    }
    return object;
  }

  /**
   * Execute a query and keep the results that are instances of T.
   * A store failure is logged and reported; the result is then empty.
   */
  private async loadObjects(query: Query, operation: RepositoryOperation): Promise<T[]> {
    let results: ManagedObject[];
    try {
      results = await this.context.execute(query);
    } catch (error) {
      this.fail(
        operation,
        new QueryFailureError(this.entityName, `Error loading Objects [${this.entityName}]`, error)
      );
      return [];
    }

    const objects: T[] = [];
    for (const result of results) {
      const object = this.cast(result);
      if (object) {
        objects.push(object);
      } else {
        this.logger.debug('Skipping object of another entity', {
          entityName: this.entityName,
          objectEntityName: result.entityName,
        });
      }
    }
    return objects;
  }

  private cast(object: ManagedObject): T | null {
    return object instanceof this.entity ? object : null;
  }

  private fail(operation: RepositoryOperation, error: RepositoryError): void {
    const severity = severityOf(operation, error);
    const data: Record<string, unknown> = {
      entityName: this.entityName,
      operation,
      code: error.code,
    };
    if (error.cause !== undefined) {
      data.error = error.cause instanceof Error ? error.cause.message : String(error.cause);
    }

    if (severity === 'fatal') {
      this.logger.error(error.message, data);
    } else {
      this.logger.warn(error.message, data);
    }
    this.failurePolicy.handle({ operation, severity, error });
  }
}
