import { NotFoundError, StoreUnavailableError } from '@jwp-tracker/core';

const readStatus = (error: unknown): number | undefined => {
  if (typeof error !== 'object' || error === null) {
    return undefined;
  }
  if ('status' in error && typeof error.status === 'number') {
    return error.status;
  }
  if ('response' in error && typeof error.response === 'object' && error.response !== null) {
    const { response } = error;
    if ('status' in response && typeof response.status === 'number') {
      return response.status;
    }
  }
  return undefined;
};

/**
 * Maps a Sheets API failure onto the record store error taxonomy
 *
 * A worksheet that does not exist is reported by the API as an unparsable range (HTTP 400);
 * a spreadsheet that does not exist as HTTP 404. Both become NotFoundError, anything else
 * StoreUnavailableError.
 */
export const toStoreError = (error: unknown, operation: string, tableName: string): Error => {
  if (error instanceof NotFoundError || error instanceof StoreUnavailableError) {
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);
  if (readStatus(error) === 404 || message.includes('Unable to parse range')) {
    return new NotFoundError('Table', tableName);
  }
  return new StoreUnavailableError(operation, error);
};
