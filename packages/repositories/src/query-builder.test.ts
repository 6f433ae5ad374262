import { describe, it, expect } from 'vitest';
import { ascending, descending, eq } from '@strata/protocol';
import { QueryBuilder } from './query-builder.js';

describe('QueryBuilder', () => {
  it('builds an unrestricted query by default', () => {
    const query = new QueryBuilder('Note').build();

    expect(query).toEqual({
      entityName: 'Note',
      predicate: undefined,
      sortDescriptors: [],
      fetchLimit: undefined,
      includesSubentities: true,
      includesPropertyValues: true,
    });
  });

  it('collects predicate, ordering, limit and flags', () => {
    const query = new QueryBuilder('Note')
      .where(eq('pinned', true))
      .orderBy('updatedAt', 'desc')
      .orderBy('title')
      .limit(5)
      .includesSubentities(false)
      .includesPropertyValues(false)
      .build();

    expect(query.predicate).toEqual({ op: 'eq', key: 'pinned', value: true });
    expect(query.sortDescriptors).toEqual([descending('updatedAt'), ascending('title')]);
    expect(query.fetchLimit).toBe(5);
    expect(query.includesSubentities).toBe(false);
    expect(query.includesPropertyValues).toBe(false);
  });

  it('replaces ordering with sortedBy', () => {
    const query = new QueryBuilder('Note').orderBy('title').sortedBy([descending('wordCount')]).build();

    expect(query.sortDescriptors).toEqual([descending('wordCount')]);
  });

  it('restores store-default order when sortedBy gets undefined', () => {
    const query = new QueryBuilder('Note').orderBy('title').sortedBy(undefined).build();

    expect(query.sortDescriptors).toEqual([]);
  });

  it('clears the predicate when where gets undefined', () => {
    const query = new QueryBuilder('Note').where(eq('pinned', true)).where(undefined).build();

    expect(query.predicate).toBeUndefined();
  });

  it('rejects limits that are not positive integers', () => {
    const builder = new QueryBuilder('Note');

    expect(() => builder.limit(0)).toThrow(RangeError);
    expect(() => builder.limit(1.5)).toThrow('Fetch limit must be a positive integer, got 1.5');
  });

  it('builds frozen queries that later calls do not change', () => {
    const builder = new QueryBuilder('Note').orderBy('title');
    const query = builder.build();

    builder.orderBy('wordCount');

    expect(Object.isFrozen(query)).toBe(true);
    expect(Object.isFrozen(query.sortDescriptors)).toBe(true);
    expect(query.sortDescriptors).toEqual([ascending('title')]);
  });
});
