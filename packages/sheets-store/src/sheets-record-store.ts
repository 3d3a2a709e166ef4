/**
 * Google Sheets Record Store
 *
 * Each table is one worksheet of the spreadsheet: the first row holds the column names,
 * every following row one record.
 */

import type { CellValue, RecordStore, Table } from '@jwp-tracker/core';
import {
  DEFAULTS,
  NotFoundError,
  storeLog,
  tableFromMatrix,
  tableToMatrix,
  toDisplayString,
} from '@jwp-tracker/core';
import { toStoreError } from './errors.js';
import type { SheetCell, SpreadsheetApi } from './spreadsheet-api.js';
import { sheetRange } from './spreadsheet-api.js';

export interface SheetsRecordStoreOptions {
  api: SpreadsheetApi;
  /** Row count of worksheets created on first append (default: 1000) */
  newSheetRows?: number;
}

/** Converts a value read with UNFORMATTED_VALUE; blank cells become null */
export const fromSheetCell = (value: unknown): CellValue => {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value === 'string') {
    return value === '' ? null : value;
  }
  if (typeof value === 'boolean') {
    return value ? 'TRUE' : 'FALSE';
  }
  return null;
};

/** Converts a cell for writing; dates go out in their display form */
export const toSheetCell = (value: CellValue): SheetCell => {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : '';
  }
  return toDisplayString(value);
};

/**
 * Creates a RecordStore backed by one Google spreadsheet
 *
 * @example
 * ```typescript
 * const store = createSheetsRecordStore({
 *   api: createGoogleSpreadsheetApi({ credentials, spreadsheetId }),
 * });
 * const master = await store.fetchTable('Sheet1');
 * ```
 */
export const createSheetsRecordStore = (options: SheetsRecordStoreOptions): RecordStore => {
  const { api } = options;
  const newSheetRows = options.newSheetRows ?? DEFAULTS.AUDIT_LOG_SHEET_ROWS;

  const call = async <T>(operation: string, tableName: string, fn: () => Promise<T>): Promise<T> => {
    try {
      return await fn();
    } catch (error) {
      throw toStoreError(error, operation, tableName);
    }
  };

  return {
    fetchTable: async (tableName: string): Promise<Table> => {
      const values = await call('fetchTable', tableName, () => api.getValues(sheetRange(tableName)));
      const [header, ...body] = values;
      if (!header || header.length === 0) {
        storeLog('Worksheet %s is empty', tableName);
        return { columns: [], rows: [] };
      }

      const columns = header.map((cell) => toDisplayString(fromSheetCell(cell)));
      const matrix = body.map((row) => columns.map((_, index) => fromSheetCell(row[index])));
      storeLog('Fetched %d rows from %s', matrix.length, tableName);
      return tableFromMatrix(columns, matrix);
    },

    // Not atomic: a failure after the clear leaves the worksheet empty.
    replaceAll: async (tableName: string, table: Table): Promise<void> => {
      const values = [[...table.columns], ...tableToMatrix(table).map((row) => row.map(toSheetCell))];
      await call('replaceAll', tableName, async () => {
        await api.clearValues(sheetRange(tableName));
        await api.updateValues(sheetRange(tableName, 'A1'), values);
      });
      storeLog('Replaced %s with %d rows', tableName, table.rows.length);
    },

    appendRow: async (tableName: string, header: readonly string[], row: readonly CellValue[]): Promise<void> => {
      const cells = row.map(toSheetCell);
      try {
        await api.appendValues(sheetRange(tableName, 'A1'), [cells]);
        storeLog('Appended a row to %s', tableName);
        return;
      } catch (error) {
        const storeError = toStoreError(error, 'appendRow', tableName);
        if (!(storeError instanceof NotFoundError)) {
          throw storeError;
        }
      }

      storeLog('Worksheet %s not found, creating it', tableName);
      await call('appendRow', tableName, async () => {
        await api.addSheet(tableName, newSheetRows, header.length);
        await api.appendValues(sheetRange(tableName, 'A1'), [[...header], cells]);
      });
    },
  };
};
