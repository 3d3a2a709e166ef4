import {
  CsvValidationError,
  NotFoundError,
  REQUIRED_IMPORT_COLUMNS,
  ShapeMismatchError,
  StoreUnavailableError,
} from '@jwp-tracker/core';
import { describe, expect, it } from 'vitest';
import { statusForError } from '../src/errors.js';

describe('statusForError', () => {
  it('should map the error taxonomy onto HTTP statuses', () => {
    expect(statusForError(new NotFoundError('Table', 'Sheet1'))).toBe(404);
    expect(statusForError(new CsvValidationError(['Agency'], REQUIRED_IMPORT_COLUMNS))).toBe(400);
    expect(statusForError(new ShapeMismatchError('extra-row', 'Row 9 is not one of the rows open for editing'))).toBe(
      400,
    );
    expect(statusForError(new ShapeMismatchError('stale-row', "Row 0 now holds 'A2', not 'A1'"))).toBe(409);
    expect(statusForError(new StoreUnavailableError('replaceAll', new Error('timeout')))).toBe(502);
    expect(statusForError(new Error('boom'))).toBe(500);
  });
});
