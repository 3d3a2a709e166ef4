/**
 * Audit log row codec
 *
 * @module audit-log/codec
 *
 * @remarks
 * Each audit entry is one row of six text cells. The Changes cell holds a JSON object
 * mapping field name to a `from '<before>' to '<after>'` description.
 *
 * @example
 * ```typescript
 * toAuditLogRow(record);
 * // => ['2024-03-05 14:07:09', 'Jane Doe', 'jane@example.org', 'WHO', 'A1',
 * //     '{"Budget Spent":"from \'100\' to \'250\'"}']
 * ```
 */

import type { AuditLogEntry, ChangeRecord, FieldChange } from '../domain/change-types.js';
import type { Table } from '../domain/table.js';
import { toDisplayString } from '../utils/display.js';

/** Human-readable description of one field change */
export const describeFieldChange = (change: FieldChange<string>): string =>
  `from '${change.before}' to '${change.after}'`;

/** Serializes a change record to the audit log's column order */
export const toAuditLogRow = (record: ChangeRecord): string[] => {
  const descriptions: Record<string, string> = {};
  for (const [field, change] of Object.entries(record.changes)) {
    descriptions[field] = describeFieldChange(change);
  }

  return [
    record.timestamp,
    record.actorName,
    record.actorEmail,
    record.actorGroup,
    record.rowLabel,
    JSON.stringify(descriptions),
  ];
};

const isStringRecord = (value: unknown): value is Record<string, string> => {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return false;
  }
  return Object.values(value).every((entry) => typeof entry === 'string');
};

/**
 * Parses the Changes cell
 *
 * @returns The field descriptions, or an empty object when the cell is not a JSON object of strings
 */
export const parseChangesCell = (text: string): Record<string, string> => {
  if (text.trim() === '') {
    return {};
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    return {};
  }
  return isStringRecord(parsed) ? parsed : {};
};

/**
 * Reads an audit log table for review, newest entries first
 *
 * @remarks
 * Timestamps are `YYYY-MM-DD HH:mm:ss`, so lexical order is chronological. Entries
 * sharing a timestamp keep their append order.
 */
export const parseAuditLog = (table: Table): AuditLogEntry[] => {
  const entries = table.rows.map((row): AuditLogEntry => {
    const rawChanges = toDisplayString(row.values.Changes);
    return {
      timestamp: toDisplayString(row.values.Timestamp),
      userName: toDisplayString(row.values['User Name']),
      userEmail: toDisplayString(row.values['User Email']),
      agency: toDisplayString(row.values.Agency),
      activity: toDisplayString(row.values.Activity),
      changes: parseChangesCell(rawChanges),
      rawChanges,
    };
  });

  return entries
    .map((entry, position) => ({ entry, position }))
    .sort((a, b) => {
      if (a.entry.timestamp === b.entry.timestamp) {
        return a.position - b.position;
      }
      return a.entry.timestamp < b.entry.timestamp ? 1 : -1;
    })
    .map(({ entry }) => entry);
};
