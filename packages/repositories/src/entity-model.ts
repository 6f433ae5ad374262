// Entity model - the entity classes a store knows, and their inheritance

import {
  validateEntityDescriptions,
  type EntityDescription,
  type ObjectIdentifier,
  type PropertyBag,
} from '@strata/protocol';
import { InvalidEntityModelError, StoreError } from './errors.js';
import { ManagedObject, type EntityClass } from './managed-object.js';

/**
 * Registry of entity classes shared by a store and all of its contexts.
 *
 * @example
 * ```ts
 * class Note extends ManagedObject { static readonly entityName: string = 'Note'; }
 * class Checklist extends Note { static readonly entityName: string = 'Checklist'; }
 *
 * const model = EntityModel.fromClasses([Note, Checklist]);
 * model.entityNamesFor('Note', true);  // ['Note', 'Checklist']
 * model.entityNamesFor('Note', false); // ['Note']
 * ```
 */
export class EntityModel {
  readonly descriptions: readonly EntityDescription[];
  private readonly classes: Map<string, EntityClass<ManagedObject>>;
  private readonly children: Map<string, string[]>;

  private constructor(classes: readonly EntityClass<ManagedObject>[], descriptions: EntityDescription[]) {
    this.descriptions = descriptions;
    this.classes = new Map(classes.map((cls) => [cls.entityName, cls]));
    this.children = new Map();

    for (const description of descriptions) {
      if (description.parent === undefined) continue;
      const siblings = this.children.get(description.parent) ?? [];
      siblings.push(description.name);
      this.children.set(description.parent, siblings);
    }
  }

  /**
   * Build a model from entity classes. A class whose superclass is itself an
   * entity class becomes a sub-entity of it.
   *
   * @throws InvalidEntityModelError when the classes do not form a valid model
   */
  static fromClasses(classes: readonly EntityClass<ManagedObject>[]): EntityModel {
    const descriptions = classes.map(describeClass);
    const result = validateEntityDescriptions(descriptions);
    if (!result.valid) {
      throw new InvalidEntityModelError(result.errors);
    }
    return new EntityModel(classes, descriptions);
  }

  has(entityName: string): boolean {
    return this.classes.has(entityName);
  }

  classFor(entityName: string): EntityClass<ManagedObject> | undefined {
    return this.classes.get(entityName);
  }

  /**
   * The entity itself, followed by all of its descendants when requested.
   */
  entityNamesFor(entityName: string, includesSubentities: boolean): string[] {
    const names = [entityName];
    if (!includesSubentities) return names;

    for (let i = 0; i < names.length; i++) {
      names.push(...(this.children.get(names[i]) ?? []));
    }
    return names;
  }

  /**
   * Create the managed object for a stored row.
   *
   * @throws StoreError with code UNKNOWN_ENTITY for entities outside the model
   */
  instantiate(objectId: ObjectIdentifier, properties: PropertyBag | null): ManagedObject {
    const cls = this.classes.get(objectId.entityName);
    if (!cls) {
      throw new StoreError('UNKNOWN_ENTITY', `Unknown entity "${objectId.entityName}"`);
    }
    return new cls(objectId, properties);
  }
}

function describeClass(cls: EntityClass<ManagedObject>): EntityDescription {
  const superclass: unknown = Object.getPrototypeOf(cls);
  if (isEntityClass(superclass)) {
    return { name: cls.entityName, parent: superclass.entityName };
  }
  return { name: cls.entityName };
}

function isEntityClass(value: unknown): value is EntityClass<ManagedObject> {
  return (
    typeof value === 'function' &&
    value.prototype instanceof ManagedObject &&
    Object.hasOwn(value, 'entityName') &&
    typeof Reflect.get(value, 'entityName') === 'string'
  );
}
