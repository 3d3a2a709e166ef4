/**
 * Writing detected changes back into the master table
 *
 * @module tracker/apply-changes
 */

import { DEFAULTS } from '../constants.js';
import type { RowId } from '../domain/branded-types.js';
import { unwrapId } from '../domain/branded-types.js';
import type { RowChange } from '../domain/change-types.js';
import type { CellValue, RowIdentifier, Table, TableRow } from '../domain/table.js';
import { defaultRowIdentifier } from '../domain/table.js';
import { ShapeMismatchError } from '../errors.js';
import { formatTimestamp } from '../utils/display.js';

export interface ApplyChangesOptions {
  /** Moment recorded in the last-updated field (default: now) */
  now?: Date;
  /** Column set on every changed row (default: 'Last Updated') */
  lastUpdatedField?: string;
  rowIdentifier?: RowIdentifier;
}

const indexChanges = (master: Table, changes: readonly RowChange[], rowIdentifier: RowIdentifier) => {
  const masterIds = new Set(master.rows.map(rowIdentifier));
  const masterColumns = new Set(master.columns);
  const byRow = new Map<RowId, RowChange>();

  for (const change of changes) {
    if (!masterIds.has(change.rowId)) {
      throw new ShapeMismatchError('missing-row', `Row ${unwrapId(change.rowId)} does not exist in the master table`);
    }
    for (const field of Object.keys(change.fields)) {
      if (!masterColumns.has(field)) {
        throw new ShapeMismatchError('columns', `Field '${field}' does not exist in the master table`);
      }
    }
    byRow.set(change.rowId, change);
  }

  return byRow;
};

/**
 * Returns a copy of the master table with the changed fields overwritten
 *
 * @remarks
 * Only the fields named in a change are written, plus the last-updated field of each
 * changed row. Every other row object is carried over as-is. Persisting the result is
 * the caller's job.
 *
 * @throws {ShapeMismatchError} If a change names a row or field the master table lacks
 *
 * @example
 * ```typescript
 * const updated = applyChanges(master, changes, { now: new Date('2024-03-05T14:07:09Z') });
 * // changed rows get 'Last Updated': '2024-03-05 14:07:09'
 * ```
 */
export const applyChanges = (master: Table, changes: readonly RowChange[], options: ApplyChangesOptions = {}): Table => {
  const rowIdentifier = options.rowIdentifier ?? defaultRowIdentifier;
  const lastUpdatedField = options.lastUpdatedField ?? DEFAULTS.LAST_UPDATED_FIELD;
  const changesByRow = indexChanges(master, changes, rowIdentifier);

  if (changesByRow.size === 0) {
    return master;
  }

  const timestamp = formatTimestamp(options.now ?? new Date());
  const addsColumn = !master.columns.includes(lastUpdatedField);
  const columns = addsColumn ? [...master.columns, lastUpdatedField] : master.columns;

  const rows = master.rows.map((row): TableRow => {
    const change = changesByRow.get(rowIdentifier(row));
    if (!change) {
      return addsColumn ? { id: row.id, values: { ...row.values, [lastUpdatedField]: null } } : row;
    }

    const values: Record<string, CellValue> = { ...row.values };
    for (const [field, fieldChange] of Object.entries(change.fields)) {
      values[field] = fieldChange.after;
    }
    values[lastUpdatedField] = timestamp;

    return { id: row.id, values };
  });

  return { columns, rows };
};
