/**
 * Change Type Definitions
 *
 * `RowChange` is the tracker's working form and keeps typed values so the master table
 * can be updated without losing number or date cells. `ChangeRecord` is the durable
 * audit form and only holds display strings.
 */

import type { RowId } from './branded-types.js';
import type { CellValue } from './table.js';

/** Before/after pair of one changed field */
export interface FieldChange<T = CellValue> {
  before: T;
  after: T;
}

/** Changed editable fields of one row, keyed by column name in column order */
export interface RowChange {
  rowId: RowId;
  fields: Record<string, FieldChange>;
}

/** One audit entry: a single row's detected change with actor attribution */
export interface ChangeRecord {
  /** Batch timestamp, `YYYY-MM-DD HH:mm:ss` (UTC) */
  timestamp: string;
  actorName: string;
  actorEmail: string;
  /** Agency of the actor */
  actorGroup: string;
  rowId: RowId;
  /** Human-readable identifier of the row (the activity name) */
  rowLabel: string;
  changes: Record<string, FieldChange<string>>;
}

/** Audit log row as read back for review */
export interface AuditLogEntry {
  timestamp: string;
  userName: string;
  userEmail: string;
  agency: string;
  activity: string;
  /** Field name to `from '<before>' to '<after>'` description */
  changes: Record<string, string>;
  /** The raw Changes cell as stored */
  rawChanges: string;
}
