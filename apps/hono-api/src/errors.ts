import {
  CsvValidationError,
  IdValidationError,
  NotFoundError,
  ShapeMismatchError,
  StoreUnavailableError,
} from '@jwp-tracker/core';

export type ErrorStatus = 400 | 404 | 409 | 500 | 502;

/** HTTP status for an error raised below the routes */
export const statusForError = (error: Error): ErrorStatus => {
  if (error instanceof NotFoundError) {
    return 404;
  }
  if (error instanceof ShapeMismatchError && error.reason === 'stale-row') {
    return 409;
  }
  if (error instanceof CsvValidationError || error instanceof ShapeMismatchError || error instanceof IdValidationError) {
    return 400;
  }
  if (error instanceof StoreUnavailableError) {
    return 502;
  }
  return 500;
};
