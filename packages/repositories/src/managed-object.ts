// Managed objects - the store's native persisted-object representation
//
// Entity classes extend ManagedObject and declare a static, own entityName:
//
//   class Note extends ManagedObject {
//     static readonly entityName: string = 'Note';
//
//     get title(): string {
//       return this.string('title') ?? '';
//     }
//     set title(value: string) {
//       this.setValue('title', value);
//     }
//   }
//
// A class that extends another entity class is a sub-entity of it and shares
// its parent's collection.

import {
  clonePropertyBag,
  isJsonValue,
  type JsonValue,
  type ObjectIdentifier,
  type PropertyBag,
} from '@strata/protocol';
import { FaultedObjectError, InvalidPropertyValueError } from './errors.js';

/**
 * The capability contract of an entity type: a stable entity name, and
 * construction from the store's native representation.
 */
export type EntityClass<T extends ManagedObject> = {
  readonly entityName: string;
  new (objectId: ObjectIdentifier, properties: PropertyBag | null): T;
};

export abstract class ManagedObject {
  readonly objectId: ObjectIdentifier;
  private values: PropertyBag;
  private fault: boolean;

  /**
   * Stores instantiate managed objects; callers obtain them from a repository.
   *
   * @param properties Property values, or null for a fault that only carries identity
   */
  constructor(objectId: ObjectIdentifier, properties: PropertyBag | null) {
    this.objectId = objectId;
    this.values = properties === null ? {} : clonePropertyBag(properties);
    this.fault = properties === null;
  }

  get entityName(): string {
    return this.objectId.entityName;
  }

  /**
   * True when the object was loaded without property values
   */
  get isFault(): boolean {
    return this.fault;
  }

  /**
   * Deep copy of the current property values
   */
  properties(): PropertyBag {
    return clonePropertyBag(this.values);
  }

  /**
   * Replace the property values and clear the fault.
   * Used by stores to fill in faults and to discard uncommitted edits.
   */
  hydrate(properties: PropertyBag): void {
    this.values = clonePropertyBag(properties);
    this.fault = false;
  }

  protected getValue(key: string): JsonValue | undefined {
    this.assertNotFault(key);
    return this.values[key];
  }

  /**
   * Set a property; undefined removes it.
   */
  protected setValue(key: string, value: JsonValue | undefined): void {
    this.assertNotFault(key);
    if (value === undefined) {
      delete this.values[key];
      return;
    }
    if (!isJsonValue(value)) {
      throw new InvalidPropertyValueError(this.entityName, key);
    }
    this.values[key] = structuredClone(value);
  }

  protected string(key: string): string | undefined {
    const value = this.getValue(key);
    return typeof value === 'string' ? value : undefined;
  }

  protected number(key: string): number | undefined {
    const value = this.getValue(key);
    return typeof value === 'number' ? value : undefined;
  }

  protected boolean(key: string): boolean | undefined {
    const value = this.getValue(key);
    return typeof value === 'boolean' ? value : undefined;
  }

  private assertNotFault(key: string): void {
    if (this.fault) {
      throw new FaultedObjectError(this.objectId, key);
    }
  }
}
