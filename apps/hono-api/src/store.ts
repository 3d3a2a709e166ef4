import type { RecordStore } from '@jwp-tracker/core';
import { ConfigurationError } from '@jwp-tracker/core';
import {
  createGoogleSpreadsheetApi,
  createSheetsRecordStore,
  parseServiceAccountCredentials,
} from '@jwp-tracker/sheets-store';
import type { AppConfig } from './config.js';

/**
 * Builds the Google Sheets record store named by the configuration
 *
 * @throws {ConfigurationError} If credentials or the spreadsheet id are missing or invalid
 */
export const createStoreFromConfig = (config: AppConfig): RecordStore => {
  if (config.credentialsJson === undefined) {
    throw new ConfigurationError('GSPREAD_CREDENTIALS must hold the service-account key JSON');
  }
  if (config.spreadsheetId === undefined) {
    throw new ConfigurationError('SPREADSHEET_ID must name the spreadsheet holding the master data');
  }

  const credentials = parseServiceAccountCredentials(config.credentialsJson);
  return createSheetsRecordStore({
    api: createGoogleSpreadsheetApi({ credentials, spreadsheetId: config.spreadsheetId }),
  });
};
