import { Readable } from 'node:stream';
import * as ExcelJS from 'exceljs';
import { parse } from 'csv-parse/sync';
import { ParseError, createColumn, createTable } from '@simval/domain';
import type { CellValue, TabularDecoderPort, TabularTable } from '@simval/domain';

/** Local-file-header signature of a ZIP container, i.e. an XLSX workbook. */
const XLSX_MAGIC = Buffer.from([0x50, 0x4b, 0x03, 0x04]);

const MISSING_MARKERS = new Set([
  '',
  '#N/A',
  '#N/A N/A',
  '#NA',
  '-1.#IND',
  '-1.#QNAN',
  '-NaN',
  '-nan',
  '1.#IND',
  '1.#QNAN',
  '<NA>',
  'N/A',
  'NA',
  'NULL',
  'NaN',
  'None',
  'n/a',
  'nan',
  'null',
]);

const NUMERIC_PATTERN = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;
const INFINITY_PATTERN = /^([+-])?inf(?:inity)?$/i;

const PLACEHOLDER_PREFIX = 'Unnamed';

type RawCell = string | number | null;

export function isSpreadsheet(bytes: Buffer): boolean {
  return bytes.length >= XLSX_MAGIC.length && bytes.subarray(0, XLSX_MAGIC.length).equals(XLSX_MAGIC);
}

/** Reads one cell of text: missing markers → null, numeric text → number. */
export function parseCellText(raw: string): CellValue {
  const text = raw.trim();
  if (MISSING_MARKERS.has(text)) return null;
  if (NUMERIC_PATTERN.test(text)) return Number(text);
  const infinity = INFINITY_PATTERN.exec(text);
  if (infinity) return infinity[1] === '-' ? -Infinity : Infinity;
  return raw;
}

function toCell(raw: RawCell): CellValue {
  return typeof raw === 'string' ? parseCellText(raw) : raw;
}

/**
 * Trims header names, drops placeholder columns (blank headers and any name
 * starting with "Unnamed") and suffixes duplicates with `.1`, `.2`, ...
 */
export function normalizeHeader(rawNames: readonly string[]): Array<{ name: string; index: number }> {
  const used = new Set<string>();
  const kept: Array<{ name: string; index: number }> = [];

  rawNames.forEach((raw, index) => {
    const trimmed = raw.trim();
    const base = trimmed === '' ? `${PLACEHOLDER_PREFIX}: ${index}` : trimmed;
    if (base.startsWith(PLACEHOLDER_PREFIX)) return;

    let name = base;
    for (let suffix = 1; used.has(name); suffix += 1) {
      name = `${base}.${suffix}`;
    }
    used.add(name);
    kept.push({ name, index });
  });

  return kept;
}

function isBlankRow(row: readonly RawCell[]): boolean {
  return row.every((cell) => toCell(cell) === null);
}

/** Every row becomes a table row, including rows whose cells are all missing. */
function buildTable(header: readonly string[], rows: readonly RawCell[][]): TabularTable {
  const columns = normalizeHeader(header).map(({ name, index }) =>
    createColumn(
      name,
      rows.map((row) => toCell(row[index] ?? null)),
    ),
  );
  return createTable(columns, rows.length);
}

// ─── Delimited text ───────────────────────────────────────────────────────────

function isStringMatrix(value: unknown): value is string[][] {
  return (
    Array.isArray(value) &&
    value.every((row) => Array.isArray(row) && row.every((cell) => typeof cell === 'string'))
  );
}

function decodeDelimited(bytes: Buffer): TabularTable {
  let text: string;
  try {
    text = new TextDecoder('utf-8', { fatal: true }).decode(bytes);
  } catch (err) {
    throw new ParseError('File is neither a spreadsheet nor UTF-8 text', { cause: err });
  }

  let records: unknown;
  try {
    records = parse(text, {
      bom: true,
      relax_column_count: true,
      skip_empty_lines: true,
    });
  } catch (err) {
    throw new ParseError(
      `Malformed delimited text: ${err instanceof Error ? err.message : String(err)}`,
      { cause: err },
    );
  }
  if (!isStringMatrix(records)) {
    throw new ParseError('Malformed delimited text: unexpected record shape');
  }

  const [header, ...rows] = records;
  if (!header) throw new ParseError('No columns to parse from file');

  rows.forEach((row, i) => {
    if (row.length > header.length) {
      throw new ParseError(
        `Malformed delimited text: expected ${header.length} fields in record ${i + 2}, saw ${row.length}`,
      );
    }
  });

  return buildTable(header, rows);
}

// ─── Spreadsheet ──────────────────────────────────────────────────────────────

function excelPrimitive(value: ExcelJS.CellValue): RawCell {
  if (value === null || value === undefined) return null;
  if (typeof value === 'number' || typeof value === 'string') return value;
  if (typeof value === 'boolean') return value ? 1 : 0;
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? null : value.toISOString();
  }
  if ('richText' in value) return value.richText.map((part) => part.text).join('');
  if ('hyperlink' in value) return value.text;
  if ('error' in value) return null;
  // formula cells: use the cached result
  return excelPrimitive(value.result ?? null);
}

async function decodeWorkbook(bytes: Buffer): Promise<TabularTable> {
  const workbook = new ExcelJS.Workbook();
  try {
    await workbook.xlsx.read(Readable.from([bytes]));
  } catch (err) {
    throw new ParseError(
      `Cannot read spreadsheet: ${err instanceof Error ? err.message : String(err)}`,
      { cause: err },
    );
  }

  const sheet = workbook.worksheets[0];
  if (!sheet) throw new ParseError('Spreadsheet has no worksheets');

  const width = sheet.columnCount;
  const height = sheet.rowCount;
  if (width === 0 || height === 0) throw new ParseError('No columns to parse from file');

  const grid: RawCell[][] = [];
  for (let r = 1; r <= height; r += 1) {
    const row = sheet.getRow(r);
    const cells: RawCell[] = [];
    for (let c = 1; c <= width; c += 1) {
      cells.push(excelPrimitive(row.getCell(c).value));
    }
    grid.push(cells);
  }

  // formatting can leave styled but empty rows below the data
  while (grid.length > 1 && isBlankRow(grid[grid.length - 1] ?? [])) grid.pop();

  const [headerCells = [], ...rows] = grid;
  const header = headerCells.map((cell) => (cell === null ? '' : String(cell)));
  return buildTable(header, rows);
}

/**
 * Decodes an uploaded file into a table. XLSX is recognised by its magic
 * header; everything else is read as comma-separated UTF-8 text.
 */
export async function decodeTabular(bytes: Buffer): Promise<TabularTable> {
  return isSpreadsheet(bytes) ? decodeWorkbook(bytes) : decodeDelimited(bytes);
}

export class TabularFileDecoder implements TabularDecoderPort {
  decode(bytes: Buffer): Promise<TabularTable> {
    return decodeTabular(bytes);
  }
}
