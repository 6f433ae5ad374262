// Entity Model Validation
//
// Validates the entity descriptions a store is opened with.
// A store refuses to open with an invalid model.

import { isValidEntityName, type EntityDescription } from '../types/model.js';

/**
 * Result of validating an entity model
 */
export type EntityModelValidationResult = {
  valid: boolean;
  errors: EntityModelValidationError[];
};

/**
 * A validation error (the model cannot be used)
 */
export type EntityModelValidationError = {
  path: string;
  message: string;
  code: EntityModelValidationErrorCode;
};

export type EntityModelValidationErrorCode =
  | 'EMPTY_MODEL'
  | 'INVALID_NAME'
  | 'DUPLICATE_ENTITY'
  | 'UNKNOWN_PARENT'
  | 'CIRCULAR_INHERITANCE';

/**
 * Validate a list of entity descriptions.
 *
 * Checks that:
 * - there is at least one entity
 * - every name is a valid entity name and unique
 * - every parent names another entity in the list
 * - no entity inherits from itself, directly or through its ancestors
 */
export function validateEntityDescriptions(
  descriptions: readonly EntityDescription[]
): EntityModelValidationResult {
  const errors: EntityModelValidationError[] = [];

  if (descriptions.length === 0) {
    errors.push({
      path: 'entities',
      message: 'Model must describe at least one entity',
      code: 'EMPTY_MODEL',
    });
    return { valid: false, errors };
  }

  const parents = new Map<string, string | undefined>();

  descriptions.forEach((description, index) => {
    const path = `entities[${index}]`;

    if (!isValidEntityName(description.name)) {
      errors.push({
        path: `${path}.name`,
        message: `Invalid entity name "${description.name}" (letters, digits and underscores, starting with a letter)`,
        code: 'INVALID_NAME',
      });
      return;
    }

    if (parents.has(description.name)) {
      errors.push({
        path: `${path}.name`,
        message: `Duplicate entity "${description.name}"`,
        code: 'DUPLICATE_ENTITY',
      });
      return;
    }

    parents.set(description.name, description.parent);
  });

  descriptions.forEach((description, index) => {
    const parent = description.parent;
    if (parent === undefined) return;

    if (!parents.has(parent)) {
      errors.push({
        path: `entities[${index}].parent`,
        message: `Entity "${description.name}" inherits from unknown entity "${parent}"`,
        code: 'UNKNOWN_PARENT',
      });
      return;
    }

    // Walk the ancestor chain; revisiting any entity means a cycle
    const seen = new Set<string>([description.name]);
    let current: string | undefined = parent;
    while (current !== undefined) {
      if (seen.has(current)) {
        errors.push({
          path: `entities[${index}].parent`,
          message: `Entity "${description.name}" has a circular inheritance chain`,
          code: 'CIRCULAR_INHERITANCE',
        });
        return;
      }
      seen.add(current);
      current = parents.get(current);
    }
  });

  return {
    valid: errors.length === 0,
    errors,
  };
}
