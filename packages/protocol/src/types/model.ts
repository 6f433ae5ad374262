// Entity model types

/**
 * Describes one entity known to a store.
 * An entity with a parent shares its parent's collection as a sub-entity.
 */
export type EntityDescription = {
  /**
   * Stable entity name, e.g. "Note"
   */
  name: string;

  /**
   * Name of the entity this one inherits from
   */
  parent?: string;
};

/**
 * Check if a string is a valid entity name
 */
export function isValidEntityName(name: string): boolean {
  return /^[A-Za-z][A-Za-z0-9_]*$/.test(name);
}
