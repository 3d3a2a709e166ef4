/**
 * Table Type Definitions
 *
 * Tables are transient: they are rebuilt from the record store on every session and
 * never mutated in place by the tracker.
 */

import { DEFAULTS, MASTER_COLUMNS } from '../constants.js';
import type { RowId } from './branded-types.js';
import { rowIdFromIndex } from './branded-types.js';

/** Value held by a single cell */
export type CellValue = string | number | Date | null;

/** Mapping from column name to cell value */
export type Row = Readonly<Record<string, CellValue>>;

/** A row together with its stable identity in the master table */
export interface TableRow {
  readonly id: RowId;
  readonly values: Row;
}

/** Ordered rows sharing one ordered column set */
export interface Table {
  readonly columns: readonly string[];
  readonly rows: readonly TableRow[];
}

/** Resolves the identity of a row */
export type RowIdentifier = (row: TableRow) => RowId;

/** Reads the identity carried by the row itself */
export const defaultRowIdentifier: RowIdentifier = (row) => row.id;

/**
 * Builds a table from plain records, assigning positional row ids
 *
 * @remarks
 * Columns missing from a record are filled with `null` so every row shares the column set.
 *
 * @example
 * ```typescript
 * const table = createTable(['Agency', 'Activity'], [{ Agency: 'WHO', Activity: 'A1' }]);
 * // => { columns: ['Agency', 'Activity'], rows: [{ id: '0', values: { Agency: 'WHO', Activity: 'A1' } }] }
 * ```
 */
export const createTable = (columns: readonly string[], records: readonly Record<string, CellValue>[]): Table => {
  return {
    columns: [...columns],
    rows: records.map((record, index) => ({
      id: rowIdFromIndex(index),
      values: normalizeRow(columns, record),
    })),
  };
};

/** Builds a table from a header and positional cells, as spreadsheets and CSV files hand them over */
export const tableFromMatrix = (columns: readonly string[], matrix: readonly (readonly CellValue[])[]): Table => {
  return createTable(
    columns,
    matrix.map((cells) => Object.fromEntries(columns.map((column, index) => [column, cells[index] ?? null] as const))),
  );
};

/** Converts a table back to a header row and positional cells */
export const tableToMatrix = (table: Table): CellValue[][] => {
  return table.rows.map((row) => table.columns.map((column) => row.values[column] ?? null));
};

const normalizeRow = (columns: readonly string[], record: Record<string, CellValue>): Row => {
  const values: Record<string, CellValue> = {};
  for (const column of columns) {
    values[column] = record[column] ?? null;
  }
  return values;
};

/** Empty master table, used when the data sheet has not been initialised yet */
export const emptyMasterTable = (): Table => ({ columns: [...MASTER_COLUMNS], rows: [] });

/** Indexes rows by identity, preserving the first occurrence */
export const indexRows = (table: Table, rowIdentifier: RowIdentifier = defaultRowIdentifier): Map<RowId, TableRow> => {
  const index = new Map<RowId, TableRow>();
  for (const row of table.rows) {
    const id = rowIdentifier(row);
    if (!index.has(id)) {
      index.set(id, row);
    }
  }
  return index;
};

/**
 * Sorted unique non-empty values of the group column, used to populate the login form
 */
export const listAgencies = (table: Table, groupField: string = DEFAULTS.GROUP_FIELD): string[] => {
  if (!table.columns.includes(groupField)) {
    return [];
  }

  const agencies = new Set<string>();
  for (const row of table.rows) {
    const value = row.values[groupField];
    if (typeof value === 'string' && value.trim() !== '') {
      agencies.add(value);
    }
  }
  return [...agencies].sort();
};

/**
 * Restricts a table to one agency's rows, keeping every row's original identity
 */
export const filterByAgency = (table: Table, agency: string, groupField: string = DEFAULTS.GROUP_FIELD): Table => {
  return {
    columns: table.columns,
    rows: table.rows.filter((row) => row.values[groupField] === agency),
  };
};
