/**
 * Spreadsheet API Interface
 *
 * The handful of Google Sheets calls the record store needs, kept behind an interface so
 * the store can be exercised against an in-process fake.
 *
 * @packageDocumentation
 */

/** Cell value accepted by the Sheets API with the RAW input option */
export type SheetCell = string | number;

export interface SpreadsheetApi {
  /** Reads every value of a range; unformatted numbers stay numbers */
  getValues(range: string): Promise<unknown[][]>;
  clearValues(range: string): Promise<void>;
  updateValues(range: string, values: SheetCell[][]): Promise<void>;
  appendValues(range: string, values: SheetCell[][]): Promise<void>;
  addSheet(title: string, rowCount: number, columnCount: number): Promise<void>;
}

/**
 * A1 reference to a whole worksheet
 *
 * @example
 * ```typescript
 * sheetRange('Audit_Log');      // => "'Audit_Log'"
 * sheetRange("Q1's data", 'A1'); // => "'Q1''s data'!A1"
 * ```
 */
export const sheetRange = (title: string, cell?: string): string => {
  const quoted = `'${title.replace(/'/g, "''")}'`;
  return cell ? `${quoted}!${cell}` : quoted;
};
