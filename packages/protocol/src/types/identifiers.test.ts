// Tests for object identifier URIs

import { describe, it, expect } from 'vitest';
import {
  formatObjectIdentifier,
  parseObjectIdentifier,
  sameObjectIdentifier,
  type ObjectIdentifier,
} from './identifiers.js';

const objectId: ObjectIdentifier = { storeId: 'store-1', entityName: 'Note', key: 'note-1' };

describe('formatObjectIdentifier', () => {
  it('should format a strata URI', () => {
    expect(formatObjectIdentifier(objectId)).toBe('strata://store-1/Note/note-1');
  });

  it('should percent-encode segments', () => {
    expect(formatObjectIdentifier({ ...objectId, key: 'a/b c' })).toBe('strata://store-1/Note/a%2Fb%20c');
  });
});

describe('parseObjectIdentifier', () => {
  it('should read back a formatted identifier', () => {
    const uri = formatObjectIdentifier({ ...objectId, key: 'a/b c' });
    expect(parseObjectIdentifier(uri)).toEqual({ ...objectId, key: 'a/b c' });
  });

  it('should return null for other URIs', () => {
    expect(parseObjectIdentifier('https://store-1/Note/note-1')).toBeNull();
    expect(parseObjectIdentifier('strata://store-1/Note')).toBeNull();
    expect(parseObjectIdentifier('strata://store-1/Note/%E0%A4%A')).toBeNull();
  });
});

describe('sameObjectIdentifier', () => {
  it('should compare every component', () => {
    expect(sameObjectIdentifier(objectId, { ...objectId })).toBe(true);
    expect(sameObjectIdentifier(objectId, { ...objectId, storeId: 'store-2' })).toBe(false);
    expect(sameObjectIdentifier(objectId, { ...objectId, entityName: 'Tag' })).toBe(false);
  });
});
