// Entity classes shared by the tests

import { EntityModel } from './entity-model.js';
import { ManagedObject } from './managed-object.js';

export class Note extends ManagedObject {
  static readonly entityName: string = 'Note';

  get title(): string {
    return this.string('title') ?? '';
  }
  set title(value: string) {
    this.setValue('title', value);
  }

  get wordCount(): number {
    return this.number('wordCount') ?? 0;
  }
  set wordCount(value: number) {
    this.setValue('wordCount', value);
  }

  get pinned(): boolean {
    return this.boolean('pinned') ?? false;
  }
  set pinned(value: boolean) {
    this.setValue('pinned', value);
  }
}

export class Checklist extends Note {
  static readonly entityName: string = 'Checklist';

  get items(): string[] {
    const items = this.getValue('items');
    return Array.isArray(items) ? items.filter((item): item is string => typeof item === 'string') : [];
  }
  set items(value: string[]) {
    this.setValue('items', value);
  }
}

export class Tag extends ManagedObject {
  static readonly entityName: string = 'Tag';

  get name(): string {
    return this.string('name') ?? '';
  }
  set name(value: string) {
    this.setValue('name', value);
  }
}

export function createTestModel(): EntityModel {
  return EntityModel.fromClasses([Note, Checklist, Tag]);
}
