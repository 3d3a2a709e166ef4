/**
 * Record Store Interface
 *
 * Storage-agnostic contract for the spreadsheet holding the master table and the audit log.
 * The tracker never calls a store itself; the save workflow and the HTTP layer do.
 *
 * @packageDocumentation
 */

import type { CellValue, Table } from '../domain/table.js';

/**
 * Named tables held by a store
 *
 * @example
 * ```typescript
 * const master = await store.fetchTable('Sheet1');
 * await store.replaceAll('Sheet1', updated);
 * await store.appendRow('Audit_Log', AUDIT_LOG_HEADER, row);
 * ```
 */
export interface RecordStore {
  /**
   * Reads a whole table; row ids are the rows' positions
   *
   * @throws {NotFoundError} If the table does not exist
   * @throws {StoreUnavailableError} If the store cannot be reached
   */
  fetchTable(tableName: string): Promise<Table>;

  /**
   * Replaces every row and column of a table
   *
   * @remarks
   * The only write primitive for the master table. Concurrent callers are not
   * serialized: the last overwrite wins.
   *
   * @throws {StoreUnavailableError} If the write is rejected
   */
  replaceAll(tableName: string, table: Table): Promise<void>;

  /**
   * Appends one row, creating the table with the given header on first use
   *
   * @throws {StoreUnavailableError} If the write is rejected
   */
  appendRow(tableName: string, header: readonly string[], row: readonly CellValue[]): Promise<void>;
}
