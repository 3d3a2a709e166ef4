/** @jwp-tracker/sheets-store - Google Sheets record store */

export type { ServiceAccountCredentials } from './credentials.js';
export { parseServiceAccountCredentials } from './credentials.js';
export { toStoreError } from './errors.js';
export type { GoogleSpreadsheetOptions } from './google-client.js';
export { createGoogleSpreadsheetApi, SHEETS_SCOPES } from './google-client.js';
export type { SheetsRecordStoreOptions } from './sheets-record-store.js';
export { createSheetsRecordStore, fromSheetCell, toSheetCell } from './sheets-record-store.js';
export type { SheetCell, SpreadsheetApi } from './spreadsheet-api.js';
export { sheetRange } from './spreadsheet-api.js';
