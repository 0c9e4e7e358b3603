import { parse } from 'csv-parse/sync';
import { TableParseError } from './errors.js';
import { Table, type Row, type Scalar } from './tabularResult.js';

// No leading zeros, so codes such as "007" stay strings
const NUMERIC_CELL = /^-?(0|[1-9]\d*)(\.\d+)?([eE][+-]?\d+)?$/;

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toScalar(value: unknown): Scalar | undefined {
  if (value === undefined || value === null) {
    return null;
  }
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    return value;
  }
  return undefined;
}

/**
 * Walk a dot-separated path (e.g. "data.elements") into a parsed JSON
 * document. An empty or missing path returns the document itself.
 */
export function selectRecords(document: unknown, path?: string): unknown {
  if (!path) {
    return document;
  }

  let current: unknown = document;
  for (const segment of path.split('.')) {
    if (!isPlainObject(current) || !(segment in current)) {
      throw new TableParseError(`No value at "${path}" (missing "${segment}")`);
    }
    current = current[segment];
  }
  return current;
}

/**
 * Build a table from an array of flat JSON records.
 */
export function tableFromRecords(value: unknown): Table {
  if (!Array.isArray(value)) {
    throw new TableParseError('Expected an array of records');
  }

  const rows: Row[] = [];
  value.forEach((record: unknown, index) => {
    if (!isPlainObject(record)) {
      throw new TableParseError(`Record ${String(index)} is not an object`);
    }

    const row: Record<string, Scalar> = {};
    for (const [key, cell] of Object.entries(record)) {
      const scalar = toScalar(cell);
      if (scalar === undefined) {
        throw new TableParseError(`Record ${String(index)} column "${key}" is not a scalar value`);
      }
      row[key] = scalar;
    }
    rows.push(row);
  });

  return new Table(rows);
}

function coerceCell(cell: string): Scalar {
  if (cell === '') {
    return null;
  }
  if (cell === 'true' || cell === 'false') {
    return cell === 'true';
  }
  if (NUMERIC_CELL.test(cell)) {
    const value = Number(cell);
    // Integers beyond 2^53 would lose digits
    return Number.isInteger(value) && !Number.isSafeInteger(value) ? cell : value;
  }
  return cell;
}

/**
 * Build a table from CSV text. The first record is the header; numeric and
 * boolean cells are coerced, empty cells become null.
 */
export function tableFromCsv(text: string): Table {
  let records: unknown;
  try {
    records = parse(text, { bom: true, skip_empty_lines: true, trim: true });
  } catch (error) {
    throw new TableParseError(
      `Invalid CSV: ${error instanceof Error ? error.message : String(error)}`,
      { cause: error }
    );
  }

  if (!Array.isArray(records) || records.length === 0) {
    return Table.empty();
  }

  const lines: string[][] = records.map((record: unknown) => {
    if (!Array.isArray(record)) {
      throw new TableParseError('Unexpected CSV record shape');
    }
    return record.map((cell: unknown) => String(cell));
  });

  const [header = [], ...body] = lines;
  const rows = body.map(cells => {
    const row: Record<string, Scalar> = {};
    header.forEach((column, i) => {
      row[column] = coerceCell(cells[i] ?? '');
    });
    return row;
  });

  return new Table(rows, header);
}
