/**
 * CSV parsing and serialization for master table import and export
 *
 * @module csv/codec
 */

import { parse, stringify } from 'csv/sync';
import type { CellValue, Table } from '../domain/table.js';
import { tableFromMatrix, tableToMatrix } from '../domain/table.js';
import { csvLog } from '../utils/debug.js';
import { toDisplayString } from '../utils/display.js';

const isStringMatrix = (value: unknown): value is string[][] => {
  return (
    Array.isArray(value) &&
    value.every((record) => Array.isArray(record) && record.every((cell) => typeof cell === 'string'))
  );
};

const toCell = (text: string): CellValue => (text === '' ? null : text);

/**
 * Parses CSV text with a header row into a table
 *
 * @remarks
 * Empty cells become `null`; everything else is kept as text. A leading BOM is dropped
 * and blank lines are skipped. Empty input yields a table without columns.
 *
 * @example
 * ```typescript
 * parseCsv('Agency,Activity\nWHO,A1\n');
 * // => { columns: ['Agency', 'Activity'], rows: [{ id: '0', values: { Agency: 'WHO', Activity: 'A1' } }] }
 * ```
 */
export const parseCsv = (text: string): Table => {
  const records: unknown = parse(text, {
    bom: true,
    skip_empty_lines: true,
    relax_column_count: true,
  });

  if (!isStringMatrix(records)) {
    throw new Error('CSV parser returned an unexpected shape');
  }

  const [header, ...body] = records;
  if (!header) {
    return { columns: [], rows: [] };
  }

  csvLog('Parsed CSV with %d columns and %d rows', header.length, body.length);
  return tableFromMatrix(
    header,
    body.map((record) => record.map(toCell)),
  );
};

/**
 * Serializes a table as CSV: one header row, one row per record, display-string cells
 *
 * @example
 * ```typescript
 * serializeCsv(table);
 * // => 'Agency,Activity,Budget Spent\nWHO,A1,100\n'
 * ```
 */
export const serializeCsv = (table: Table): string => {
  const body = tableToMatrix(table).map((cells) => cells.map((cell) => toDisplayString(cell)));
  return stringify([[...table.columns], ...body]);
};
