// Tests for predicate compilation, rendered with drizzle's Postgres dialect

import { describe, it, expect } from 'vitest';
import { sql, type SQL } from 'drizzle-orm';
import { PgDialect } from 'drizzle-orm/pg-core';
import { and, contains, descending, eq, exists, gt, isIn, lte, ne, not, or } from '@strata/protocol';
import { compileOrderBy, compilePredicate } from './predicates.js';

const dialect = new PgDialect();
function render(query: SQL): { sql: string; params: unknown[] } {
  const rendered = dialect.sqlToQuery(query);
  return { sql: rendered.sql, params: rendered.params };
}

const prop = (n: number) => `coalesce("objects"."properties" -> $${n}::text, 'null'::jsonb)`;

describe('compilePredicate', () => {
  it('compares equality as jsonb', () => {
    expect(render(compilePredicate(eq('title', 'Groceries')))).toEqual({
      sql: `${prop(1)} = $2::jsonb`,
      params: ['title', '"Groceries"'],
    });
  });

  it('compiles inequality', () => {
    expect(render(compilePredicate(ne('pinned', true)))).toEqual({
      sql: `${prop(1)} <> $2::jsonb`,
      params: ['pinned', 'true'],
    });
  });

  it('restricts range comparisons to values of the same type', () => {
    expect(render(compilePredicate(gt('wordCount', 100)))).toEqual({
      sql: `(jsonb_typeof(${prop(1)}) = $2 and ${prop(3)} > $4::jsonb)`,
      params: ['wordCount', 'number', 'wordCount', '100'],
    });
    expect(render(compilePredicate(lte('title', 'M'))).params).toEqual(['title', 'string', 'title', '"M"']);
  });

  it('never matches range comparisons against booleans or null', () => {
    expect(render(compilePredicate(gt('pinned', true)))).toEqual({ sql: 'false', params: [] });
    expect(render(compilePredicate(lte('dueDate', null)))).toEqual({ sql: 'false', params: [] });
  });

  it('compiles membership', () => {
    expect(render(compilePredicate(isIn('status', ['draft', 'published'])))).toEqual({
      sql: `${prop(1)} in ($2::jsonb, $3::jsonb)`,
      params: ['status', '"draft"', '"published"'],
    });
    expect(render(compilePredicate(isIn('status', [])))).toEqual({ sql: 'false', params: [] });
  });

  it('compiles substring matches on string properties', () => {
    expect(render(compilePredicate(contains('title', 'roc')))).toEqual({
      sql: `(jsonb_typeof(${prop(1)}) = 'string' and strpos("objects"."properties" ->> $2::text, $3::text) > 0)`,
      params: ['title', 'title', 'roc'],
    });
  });

  it('compiles presence checks', () => {
    expect(render(compilePredicate(exists('dueDate')))).toEqual({
      sql: `${prop(1)} <> 'null'::jsonb`,
      params: ['dueDate'],
    });
  });

  it('combines predicates', () => {
    expect(render(compilePredicate(and(eq('pinned', true), not(exists('dueDate')))))).toEqual({
      sql: `(${prop(1)} = $2::jsonb and not (${prop(3)} <> 'null'::jsonb))`,
      params: ['pinned', 'true', 'dueDate'],
    });
    expect(render(compilePredicate(or(eq('a', 1), eq('b', null)))).sql).toBe(
      `(${prop(1)} = $2::jsonb or ${prop(3)} = $4::jsonb)`
    );
  });

  it('treats empty conjunctions as true and empty disjunctions as false', () => {
    expect(render(compilePredicate(and())).sql).toBe('true');
    expect(render(compilePredicate(or())).sql).toBe('false');
  });
});

describe('compileOrderBy', () => {
  it('orders by property values with insertion order as tiebreaker', () => {
    expect(render(sql.join(compileOrderBy([descending('wordCount')]), sql`, `))).toEqual({
      sql: `${prop(1)} desc, "objects"."seq" asc`,
      params: ['wordCount'],
    });
  });

  it('falls back to insertion order', () => {
    expect(render(sql.join(compileOrderBy([]), sql`, `)).sql).toBe('"objects"."seq" asc');
  });
});
