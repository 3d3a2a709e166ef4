/**
 * Google Sheets implementation of SpreadsheetApi
 */

import { auth, sheets } from '@googleapis/sheets';
import type { ServiceAccountCredentials } from './credentials.js';
import type { SheetCell, SpreadsheetApi } from './spreadsheet-api.js';

export const SHEETS_SCOPES = ['https://www.googleapis.com/auth/spreadsheets'];

export interface GoogleSpreadsheetOptions {
  credentials: ServiceAccountCredentials;
  spreadsheetId: string;
}

/**
 * Creates a SpreadsheetApi bound to one spreadsheet, authenticated as a service account
 *
 * @example
 * ```typescript
 * const api = createGoogleSpreadsheetApi({
 *   credentials: parseServiceAccountCredentials(process.env.GSPREAD_CREDENTIALS ?? ''),
 *   spreadsheetId: process.env.SPREADSHEET_ID ?? '',
 * });
 * ```
 */
export const createGoogleSpreadsheetApi = (options: GoogleSpreadsheetOptions): SpreadsheetApi => {
  const { spreadsheetId } = options;
  const googleAuth = new auth.GoogleAuth({
    credentials: {
      client_email: options.credentials.client_email,
      private_key: options.credentials.private_key,
    },
    scopes: SHEETS_SCOPES,
  });
  const client = sheets({ version: 'v4', auth: googleAuth });

  return {
    getValues: async (range: string): Promise<unknown[][]> => {
      const response = await client.spreadsheets.values.get({
        spreadsheetId,
        range,
        valueRenderOption: 'UNFORMATTED_VALUE',
        dateTimeRenderOption: 'FORMATTED_STRING',
      });
      return response.data.values ?? [];
    },

    clearValues: async (range: string): Promise<void> => {
      await client.spreadsheets.values.clear({ spreadsheetId, range });
    },

    updateValues: async (range: string, values: SheetCell[][]): Promise<void> => {
      await client.spreadsheets.values.update({
        spreadsheetId,
        range,
        valueInputOption: 'RAW',
        requestBody: { values },
      });
    },

    appendValues: async (range: string, values: SheetCell[][]): Promise<void> => {
      await client.spreadsheets.values.append({
        spreadsheetId,
        range,
        valueInputOption: 'RAW',
        insertDataOption: 'INSERT_ROWS',
        requestBody: { values },
      });
    },

    addSheet: async (title: string, rowCount: number, columnCount: number): Promise<void> => {
      await client.spreadsheets.batchUpdate({
        spreadsheetId,
        requestBody: {
          requests: [{ addSheet: { properties: { title, gridProperties: { rowCount, columnCount } } } }],
        },
      });
    },
  };
};
