// Object identifiers - opaque, store-issued handles to one persisted object

/**
 * Stable handle to one persisted object.
 *
 * Issued by a store when an object is inserted. Callers treat it as opaque and
 * only hand it back for direct re-lookup; it is never used to build predicates.
 */
export type ObjectIdentifier = {
  /**
   * Store that issued the identifier
   */
  readonly storeId: string;

  /**
   * Entity the object was inserted as
   */
  readonly entityName: string;

  /**
   * Store-unique key of the object
   */
  readonly key: string;
};

const IDENTIFIER_SCHEME = 'strata:';
const IDENTIFIER_PATTERN = /^strata:\/\/([^/]+)\/([^/]+)\/([^/]+)$/;

/**
 * Format an identifier as a URI, e.g. "strata://<storeId>/Note/<key>".
 * Stores use the URI as the identity-map key.
 */
export function formatObjectIdentifier(objectId: ObjectIdentifier): string {
  return [
    `${IDENTIFIER_SCHEME}/`,
    encodeURIComponent(objectId.storeId),
    encodeURIComponent(objectId.entityName),
    encodeURIComponent(objectId.key),
  ].join('/');
}

/**
 * Parse a URI produced by formatObjectIdentifier.
 * Returns null for anything else.
 */
export function parseObjectIdentifier(uri: string): ObjectIdentifier | null {
  const match = IDENTIFIER_PATTERN.exec(uri);
  if (!match) return null;

  const [, storeId, entityName, key] = match;
  try {
    return {
      storeId: decodeURIComponent(storeId),
      entityName: decodeURIComponent(entityName),
      key: decodeURIComponent(key),
    };
  } catch {
    // Malformed percent-encoding
    return null;
  }
}

export function sameObjectIdentifier(a: ObjectIdentifier, b: ObjectIdentifier): boolean {
  return a.storeId === b.storeId && a.entityName === b.entityName && a.key === b.key;
}
