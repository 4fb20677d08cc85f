/**
 * Table abstraction tests: column kinds are fixed at creation and every
 * derivation returns a new table.
 */

import { describe, it, expect } from '@jest/globals';

import {
  SchemaError,
  asNumber,
  columnNames,
  createColumn,
  createTable,
  findColumn,
  hasColumn,
  isMissing,
  withColumn,
} from '../index.js';

describe('createColumn', () => {
  it('infers the kind from present values', () => {
    expect(createColumn('a', [1, null, 2.5]).kind).toBe('number');
    expect(createColumn('b', ['x', null]).kind).toBe('string');
    expect(createColumn('c', [1, 'x']).kind).toBe('mixed');
    expect(createColumn('d', [null, null]).kind).toBe('empty');
    expect(createColumn('e', []).kind).toBe('empty');
  });

  it('stores NaN as missing', () => {
    const column = createColumn('a', [Number.NaN, 1]);
    expect(column.values).toEqual([null, 1]);
    expect(column.kind).toBe('number');
  });

  it('freezes the values', () => {
    const column = createColumn('a', [1, 2]);
    expect(Object.isFrozen(column.values)).toBe(true);
  });
});

describe('createTable', () => {
  it('takes the row count from the first column', () => {
    const table = createTable([createColumn('a', [1, 2, 3]), createColumn('b', ['x', 'y', 'z'])]);
    expect(table.rowCount).toBe(3);
    expect(columnNames(table)).toEqual(['a', 'b']);
  });

  it('accepts an explicit row count for column-less tables', () => {
    expect(createTable([], 4).rowCount).toBe(4);
    expect(createTable([]).rowCount).toBe(0);
  });

  it('rejects duplicate names', () => {
    expect(() => createTable([createColumn('a', [1]), createColumn('a', [2])])).toThrow(SchemaError);
  });

  it('rejects ragged columns', () => {
    expect(() => createTable([createColumn('a', [1, 2]), createColumn('b', [1])])).toThrow(
      'Column b has 1 values, expected 2',
    );
  });
});

describe('withColumn', () => {
  const base = createTable([createColumn('a', [1, 2]), createColumn('b', [3, 4])]);

  it('appends a new column without touching the source table', () => {
    const next = withColumn(base, createColumn('c', [5, 6]));
    expect(columnNames(next)).toEqual(['a', 'b', 'c']);
    expect(columnNames(base)).toEqual(['a', 'b']);
  });

  it('replaces a same-named column in place', () => {
    const next = withColumn(base, createColumn('a', [9, 9]));
    expect(columnNames(next)).toEqual(['a', 'b']);
    expect(findColumn(next, 'a')?.values).toEqual([9, 9]);
    expect(findColumn(base, 'a')?.values).toEqual([1, 2]);
  });

  it('rejects a column of the wrong length', () => {
    expect(() => withColumn(base, createColumn('c', [1]))).toThrow(SchemaError);
  });
});

describe('lookups and cell helpers', () => {
  const table = createTable([createColumn('x', [1, null]), createColumn('y', ['p', 'q'])]);

  it('finds columns by exact name', () => {
    expect(hasColumn(table, 'x')).toBe(true);
    expect(hasColumn(table, 'X')).toBe(false);
    expect(findColumn(table, 'missing')).toBeUndefined();
  });

  it('reads cells as numbers only when they are numbers', () => {
    expect(asNumber(4)).toBe(4);
    expect(asNumber('4')).toBeNull();
    expect(asNumber(null)).toBeNull();
    expect(asNumber(undefined)).toBeNull();
  });

  it('treats null and undefined as missing', () => {
    expect(isMissing(null)).toBe(true);
    expect(isMissing(undefined)).toBe(true);
    expect(isMissing(0)).toBe(false);
    expect(isMissing('')).toBe(false);
  });
});
