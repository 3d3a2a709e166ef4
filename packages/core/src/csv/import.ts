/**
 * Validation and completion of an uploaded master table
 *
 * @module csv/import
 */

import { COLUMN, OPTIONAL_IMPORT_DEFAULTS, REQUIRED_IMPORT_COLUMNS } from '../constants.js';
import type { CellValue, Table, TableRow } from '../domain/table.js';
import { CsvValidationError } from '../errors.js';
import { csvLog } from '../utils/debug.js';

const NUMERIC_PATTERN = /^-?\d+(\.\d+)?$/;

const toBudget = (value: CellValue): CellValue => {
  if (typeof value !== 'string') {
    return value;
  }
  const trimmed = value.trim();
  return NUMERIC_PATTERN.test(trimmed) ? Number(trimmed) : value;
};

/**
 * Checks the required columns and appends missing optional ones
 *
 * @remarks
 * Absent optional columns are added with their defaults (`End Date` null, `Budget Spent` 0,
 * `Progress / Achievement to Date` '', `Last Updated` null). Numeric `Budget Spent` text
 * becomes a number. The result replaces the whole master table; it is never merged.
 *
 * @throws {CsvValidationError} If any of `Outcome, Sub-Output, Agency, Activity` is missing
 */
export const prepareImport = (table: Table): Table => {
  const missing = REQUIRED_IMPORT_COLUMNS.filter((column) => !table.columns.includes(column));
  if (missing.length > 0) {
    throw new CsvValidationError(missing, REQUIRED_IMPORT_COLUMNS);
  }

  const addedDefaults = OPTIONAL_IMPORT_DEFAULTS.filter(([column]) => !table.columns.includes(column));
  const columns = [...table.columns, ...addedDefaults.map(([column]) => column)];

  const rows = table.rows.map((row): TableRow => {
    const values: Record<string, CellValue> = { ...row.values };
    for (const [column, defaultValue] of addedDefaults) {
      values[column] = defaultValue;
    }
    values[COLUMN.BUDGET_SPENT] = toBudget(values[COLUMN.BUDGET_SPENT] ?? null);
    return { id: row.id, values };
  });

  csvLog('Prepared import of %d rows, added columns: %o', rows.length, addedDefaults.map(([column]) => column));
  return { columns, rows };
};
