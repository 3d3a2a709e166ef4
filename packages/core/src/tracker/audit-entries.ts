/**
 * Turning detected changes into audit entries
 *
 * @module tracker/audit-entries
 */

import { DEFAULTS } from '../constants.js';
import { unwrapId } from '../domain/branded-types.js';
import type { ChangeRecord, FieldChange, RowChange } from '../domain/change-types.js';
import type { RowIdentifier, Table } from '../domain/table.js';
import { defaultRowIdentifier, indexRows } from '../domain/table.js';
import type { Actor } from '../types.js';
import { formatTimestamp, toDisplayString } from '../utils/display.js';

/** Resolves the human-readable label written to the audit log for a changed row */
export type RowLabeler = (change: RowChange) => string;

export interface AuditEntryOptions {
  /** Moment stamped on every entry of the batch (default: now, captured once) */
  now?: Date;
  /** Label resolver; takes precedence over `baseline` */
  labelFor?: RowLabeler;
  /** Table the changes were computed from; rows are labeled by its `Activity` column */
  baseline?: Table;
}

/**
 * Creates a labeler that reads the label column of the baseline row
 *
 * @example
 * ```typescript
 * const labelFor = labelFromTable(baseline); // reads 'Activity'
 * ```
 */
export const labelFromTable = (
  table: Table,
  labelField: string = DEFAULTS.LABEL_FIELD,
  rowIdentifier: RowIdentifier = defaultRowIdentifier,
): RowLabeler => {
  const rows = indexRows(table, rowIdentifier);
  return (change) => {
    const row = rows.get(change.rowId);
    return row ? toDisplayString(row.values[labelField]) : unwrapId(change.rowId);
  };
};

const toDisplayChanges = (fields: Record<string, FieldChange>): Record<string, FieldChange<string>> => {
  const displayed: Record<string, FieldChange<string>> = {};
  for (const [field, change] of Object.entries(fields)) {
    displayed[field] = { before: toDisplayString(change.before), after: toDisplayString(change.after) };
  }
  return displayed;
};

/**
 * Attaches actor attribution and one batch timestamp to each change
 *
 * Before/after values are reduced to display strings; the audit log is meant to be read,
 * not replayed.
 */
export const toAuditEntries = (
  changes: readonly RowChange[],
  actor: Actor,
  options: AuditEntryOptions = {},
): ChangeRecord[] => {
  const timestamp = formatTimestamp(options.now ?? new Date());
  const labelFor =
    options.labelFor ??
    (options.baseline ? labelFromTable(options.baseline) : (change: RowChange) => unwrapId(change.rowId));

  return changes.map((change) => ({
    timestamp,
    actorName: actor.name,
    actorEmail: actor.email,
    actorGroup: actor.agency,
    rowId: change.rowId,
    rowLabel: labelFor(change),
    changes: toDisplayChanges(change.fields),
  }));
};
