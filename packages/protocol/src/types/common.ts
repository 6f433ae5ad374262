// Common types used across the protocol

/**
 * Scalar values that predicates compare against
 */
export type Scalar = string | number | boolean | null;

/**
 * Any value that survives a JSON round trip.
 * Property values of persisted objects are always JSON values.
 */
export type JsonValue = Scalar | JsonValue[] | { [key: string]: JsonValue };

/**
 * Property values of one persisted object, keyed by property name
 */
export type PropertyBag = { [key: string]: JsonValue };

/**
 * Check whether an unknown value is a JSON value.
 * Rejects undefined, functions, symbols, bigints and non-finite numbers.
 */
export function isJsonValue(value: unknown): value is JsonValue {
  if (value === null) return true;
  switch (typeof value) {
    case 'string':
    case 'boolean':
      return true;
    case 'number':
      return Number.isFinite(value);
    case 'object':
      if (Array.isArray(value)) {
        return value.every(isJsonValue);
      }
      if (!isPlainObject(value)) return false;
      return Object.values(value).every(isJsonValue);
    default:
      return false;
  }
}

function isPlainObject(value: object): boolean {
  const prototype = Object.getPrototypeOf(value);
  return prototype === Object.prototype || prototype === null;
}

/**
 * Deep copy of a property bag, so that stored and live values never alias
 */
export function clonePropertyBag(properties: PropertyBag): PropertyBag {
  return structuredClone(properties);
}
