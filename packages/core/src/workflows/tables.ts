/**
 * Reading and replacing the tables behind the admin and stakeholder views
 *
 * @module workflows/tables
 */

import { DEFAULTS } from '../constants.js';
import type { AuditLogEntry } from '../domain/change-types.js';
import type { Table } from '../domain/table.js';
import { emptyMasterTable } from '../domain/table.js';
import { parseAuditLog } from '../audit-log/codec.js';
import { parseCsv, serializeCsv } from '../csv/codec.js';
import { prepareImport } from '../csv/import.js';
import { NotFoundError } from '../errors.js';
import type { RecordStore } from '../interfaces/record-store.js';
import { coreLog } from '../utils/debug.js';

/**
 * Fetches the master table, falling back to the empty master layout when the sheet has no header yet
 */
export const loadMasterTable = async (store: RecordStore, tableName: string = DEFAULTS.DATA_TABLE): Promise<Table> => {
  const table = await store.fetchTable(tableName);
  if (table.columns.length === 0) {
    coreLog('Master table %s is empty, using the default layout', tableName);
    return emptyMasterTable();
  }
  return table;
};

/**
 * Reads the audit log for review, newest first
 *
 * @returns An empty list when nothing has been logged yet
 */
export const loadAuditLog = async (
  store: RecordStore,
  tableName: string = DEFAULTS.AUDIT_LOG_TABLE,
): Promise<AuditLogEntry[]> => {
  try {
    return parseAuditLog(await store.fetchTable(tableName));
  } catch (error) {
    if (error instanceof NotFoundError) {
      return [];
    }
    throw error;
  }
};

/** Outcome of validating an uploaded CSV */
export interface ImportPreview {
  table: Table;
  columns: readonly string[];
  rowCount: number;
}

/**
 * Parses and validates an uploaded CSV without writing anything
 *
 * @throws {CsvValidationError} If required columns are missing
 */
export const previewImport = (csvText: string): ImportPreview => {
  const table = prepareImport(parseCsv(csvText));
  return { table, columns: table.columns, rowCount: table.rows.length };
};

/**
 * Replaces the master table with an uploaded CSV
 *
 * @throws {CsvValidationError} If required columns are missing (nothing is written)
 */
export const importMasterCsv = async (
  store: RecordStore,
  csvText: string,
  tableName: string = DEFAULTS.DATA_TABLE,
): Promise<ImportPreview> => {
  const preview = previewImport(csvText);
  await store.replaceAll(tableName, preview.table);
  coreLog('Imported %d rows into %s', preview.rowCount, tableName);
  return preview;
};

/** Serializes the current master table as CSV */
export const exportMasterCsv = async (store: RecordStore, tableName: string = DEFAULTS.DATA_TABLE): Promise<string> => {
  return serializeCsv(await loadMasterTable(store, tableName));
};
