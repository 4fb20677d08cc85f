import { SchemaError } from '../errors/pipeline-errors.js';

/** A single cell. `null` is the missing marker; NaN is never stored. */
export type CellValue = number | string | null;

export type ColumnKind = 'number' | 'string' | 'mixed' | 'empty';

export interface TableColumn {
  readonly name: string;
  readonly kind: ColumnKind;
  readonly values: readonly CellValue[];
}

/**
 * Column-oriented table. Every column holds exactly `rowCount` values and
 * names are unique. Tables are never mutated: derivations go through
 * {@link withColumn}, which returns a new table.
 */
export interface TabularTable {
  readonly columns: readonly TableColumn[];
  readonly rowCount: number;
}

function inferKind(values: readonly CellValue[]): ColumnKind {
  let numbers = 0;
  let strings = 0;
  for (const value of values) {
    if (typeof value === 'number') numbers += 1;
    else if (typeof value === 'string') strings += 1;
  }
  if (numbers > 0 && strings > 0) return 'mixed';
  if (numbers > 0) return 'number';
  if (strings > 0) return 'string';
  return 'empty';
}

export function createColumn(name: string, values: readonly CellValue[]): TableColumn {
  const cleaned = values.map((value) =>
    typeof value === 'number' && Number.isNaN(value) ? null : value,
  );
  return { name, kind: inferKind(cleaned), values: Object.freeze(cleaned) };
}

export function createTable(columns: readonly TableColumn[], rowCount?: number): TabularTable {
  const expected = rowCount ?? columns[0]?.values.length ?? 0;
  const seen = new Set<string>();
  for (const column of columns) {
    if (seen.has(column.name)) {
      throw new SchemaError(`Duplicate column name: ${column.name}`);
    }
    seen.add(column.name);
    if (column.values.length !== expected) {
      throw new SchemaError(
        `Column ${column.name} has ${column.values.length} values, expected ${expected}`,
      );
    }
  }
  return { columns: Object.freeze([...columns]), rowCount: expected };
}

export function findColumn(table: TabularTable, name: string): TableColumn | undefined {
  return table.columns.find((column) => column.name === name);
}

export function hasColumn(table: TabularTable, name: string): boolean {
  return findColumn(table, name) !== undefined;
}

export function columnNames(table: TabularTable): string[] {
  return table.columns.map((column) => column.name);
}

/** Returns a copy of `table` with `column` replacing the same-named column, or appended. */
export function withColumn(table: TabularTable, column: TableColumn): TabularTable {
  const index = table.columns.findIndex((existing) => existing.name === column.name);
  const columns =
    index === -1
      ? [...table.columns, column]
      : table.columns.map((existing, i) => (i === index ? column : existing));
  return createTable(columns, table.rowCount);
}

export function isMissing(value: CellValue | undefined): value is null | undefined {
  return value === null || value === undefined;
}

/** Numeric view of a cell: the number itself, otherwise `null`. */
export function asNumber(value: CellValue | undefined): number | null {
  return typeof value === 'number' ? value : null;
}
