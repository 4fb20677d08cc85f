import { findColumn } from '@simval/domain';
import type { CellValue, TabularTable } from '@simval/domain';

/**
 * Rendering needs gap-free, index-aligned arrays: anything that is not a
 * finite number becomes `fallback` (0.0 unless stated otherwise).
 */
export function roundTo(value: number, digits: number): number {
  // toFixed rounds the exact binary value, so 2.675 → 2.67, and never overflows
  const rounded = Number(value.toFixed(digits));
  return rounded === 0 ? 0 : rounded;
}

export function sanitizeNumber(value: CellValue | undefined, digits: number, fallback = 0): number {
  return typeof value === 'number' && Number.isFinite(value) ? roundTo(value, digits) : fallback;
}

/** Whole column as a sanitized array; an absent column yields zeros. */
export function extractChannel(table: TabularTable, name: string, digits: number): number[] {
  const column = findColumn(table, name);
  if (!column) return new Array<number>(table.rowCount).fill(0);
  return column.values.map((value) => sanitizeNumber(value, digits));
}

/** Sanitized values of `name` at the given rows; an absent column yields zeros. */
export function extractRows(
  table: TabularTable,
  name: string,
  rows: readonly number[],
  digits: number,
): number[] {
  const column = findColumn(table, name);
  return rows.map((row) => (column ? sanitizeNumber(column.values[row], digits) : 0));
}
