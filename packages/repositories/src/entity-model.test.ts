import { describe, it, expect } from 'vitest';
import { EntityModel } from './entity-model.js';
import { InvalidEntityModelError, StoreError } from './errors.js';
import { ManagedObject } from './managed-object.js';
import { Checklist, Note, Tag, createTestModel } from './test-entities.js';

describe('EntityModel', () => {
  it('derives sub-entities from class inheritance', () => {
    const model = createTestModel();

    expect(model.descriptions).toEqual([
      { name: 'Note' },
      { name: 'Checklist', parent: 'Note' },
      { name: 'Tag' },
    ]);
  });

  it('lists an entity with its descendants on request', () => {
    class Recipe extends Checklist {
      static readonly entityName: string = 'Recipe';
    }
    const model = EntityModel.fromClasses([Note, Checklist, Recipe, Tag]);

    expect(model.entityNamesFor('Note', true)).toEqual(['Note', 'Checklist', 'Recipe']);
    expect(model.entityNamesFor('Note', false)).toEqual(['Note']);
    expect(model.entityNamesFor('Tag', true)).toEqual(['Tag']);
  });

  it('maps entity names to their classes', () => {
    const model = createTestModel();

    expect(model.has('Checklist')).toBe(true);
    expect(model.has('Ghost')).toBe(false);
    expect(model.classFor('Tag')).toBe(Tag);
  });

  it('rejects an invalid set of classes', () => {
    class Memo extends ManagedObject {
      static readonly entityName: string = 'Note';
    }

    expect(() => EntityModel.fromClasses([Note, Memo])).toThrow(InvalidEntityModelError);
    expect(() => EntityModel.fromClasses([])).toThrow(InvalidEntityModelError);
  });

  it('instantiates objects of registered entities only', () => {
    const model = createTestModel();

    const checklist = model.instantiate({ storeId: 'test-store', entityName: 'Checklist', key: 'c-1' }, {});

    expect(checklist).toBeInstanceOf(Checklist);
    expect(() => model.instantiate({ storeId: 'test-store', entityName: 'Ghost', key: 'g-1' }, {})).toThrow(
      StoreError
    );
  });
});
