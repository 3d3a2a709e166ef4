/**
 * Display representation of cell values
 *
 * @module display
 *
 * @remarks
 * Change detection compares values by their display string, and the audit log records
 * the same strings. `100` and `'100'` are therefore equal, while `100` and `'100.0'` are not.
 */

import type { CellValue } from '../domain/table.js';

const pad = (value: number): string => String(value).padStart(2, '0');

const formatDate = (date: Date): string =>
  `${date.getUTCFullYear()}-${pad(date.getUTCMonth() + 1)}-${pad(date.getUTCDate())}`;

const formatTime = (date: Date): string =>
  `${pad(date.getUTCHours())}:${pad(date.getUTCMinutes())}:${pad(date.getUTCSeconds())}`;

const isMidnightUtc = (date: Date): boolean =>
  date.getUTCHours() === 0 && date.getUTCMinutes() === 0 && date.getUTCSeconds() === 0;

/**
 * Formats a batch timestamp as `YYYY-MM-DD HH:mm:ss` in UTC
 *
 * @example
 * ```typescript
 * formatTimestamp(new Date('2024-03-05T14:07:09Z')); // => '2024-03-05 14:07:09'
 * ```
 */
export const formatTimestamp = (date: Date): string => `${formatDate(date)} ${formatTime(date)}`;

/**
 * Converts a cell value to the string shown to users and written to the audit log
 *
 * @example
 * ```typescript
 * toDisplayString(null);                                 // => ''
 * toDisplayString(250);                                  // => '250'
 * toDisplayString(new Date('2024-06-30T00:00:00Z'));     // => '2024-06-30'
 * toDisplayString(new Date('2024-06-30T08:15:00Z'));     // => '2024-06-30 08:15:00'
 * ```
 */
export const toDisplayString = (value: CellValue | undefined): string => {
  if (value === null || value === undefined) {
    return '';
  }

  if (typeof value === 'number') {
    return Number.isNaN(value) ? '' : String(value);
  }

  if (value instanceof Date) {
    if (Number.isNaN(value.getTime())) {
      return '';
    }
    return isMidnightUtc(value) ? formatDate(value) : formatTimestamp(value);
  }

  return value;
};
