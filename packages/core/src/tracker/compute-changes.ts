/**
 * Change detection between a baseline snapshot and its edited version
 *
 * @module tracker/compute-changes
 */

import type { RowId } from '../domain/branded-types.js';
import { unwrapId } from '../domain/branded-types.js';
import type { RowChange } from '../domain/change-types.js';
import type { RowIdentifier, Table, TableRow } from '../domain/table.js';
import { defaultRowIdentifier } from '../domain/table.js';
import { ShapeMismatchError } from '../errors.js';
import { coreLog } from '../utils/debug.js';
import { createDiffCalculator } from '../utils/diff-calculator.js';

const assertSameColumns = (baseline: Table, edited: Table): void => {
  const baselineColumns = new Set(baseline.columns);
  const editedColumns = new Set(edited.columns);

  const missing = [...baselineColumns].filter((column) => !editedColumns.has(column));
  const extra = [...editedColumns].filter((column) => !baselineColumns.has(column));

  if (missing.length > 0 || extra.length > 0) {
    throw new ShapeMismatchError(
      'columns',
      `Edited table columns differ from baseline (missing: [${missing.join(', ')}], extra: [${extra.join(', ')}])`,
    );
  }
};

const indexUniqueRows = (table: Table, rowIdentifier: RowIdentifier, tableName: string): Map<RowId, TableRow> => {
  const index = new Map<RowId, TableRow>();
  for (const row of table.rows) {
    const id = rowIdentifier(row);
    if (index.has(id)) {
      throw new ShapeMismatchError('duplicate-row', `Row ${unwrapId(id)} appears more than once in the ${tableName} table`);
    }
    index.set(id, row);
  }
  return index;
};

/**
 * Detects the edits made to a set of rows, restricted to the editable fields
 *
 * @param baseline - Snapshot the edits are compared against
 * @param edited - Same rows after editing
 * @param editableFields - Columns that are compared; every other column is ignored
 * @param rowIdentifier - Resolves row identity (defaults to the row's own id)
 * @returns One entry per changed row, in the row order of `edited`
 * @throws {ShapeMismatchError} If the tables do not share row identifiers and columns
 *
 * @example
 * ```typescript
 * const changes = computeChanges(baseline, edited, new Set(['Budget Spent', 'Progress']));
 * // => [{ rowId: '0', fields: { 'Budget Spent': { before: 100, after: 250 } } }]
 * ```
 */
export const computeChanges = (
  baseline: Table,
  edited: Table,
  editableFields: ReadonlySet<string>,
  rowIdentifier: RowIdentifier = defaultRowIdentifier,
): RowChange[] => {
  assertSameColumns(baseline, edited);

  const baselineRows = indexUniqueRows(baseline, rowIdentifier, 'baseline');
  const editedRows = indexUniqueRows(edited, rowIdentifier, 'edited');

  for (const id of baselineRows.keys()) {
    if (!editedRows.has(id)) {
      throw new ShapeMismatchError('missing-row', `Row ${unwrapId(id)} is missing from the edited table`);
    }
  }

  const comparedFields = edited.columns.filter((column) => editableFields.has(column));
  const calculateDiff = createDiffCalculator(comparedFields);
  const changes: RowChange[] = [];

  for (const row of edited.rows) {
    const id = rowIdentifier(row);
    const baselineRow = baselineRows.get(id);
    if (!baselineRow) {
      throw new ShapeMismatchError('extra-row', `Row ${unwrapId(id)} is not part of the baseline table`);
    }

    const fields = calculateDiff(baselineRow.values, row.values);
    if (fields) {
      changes.push({ rowId: id, fields });
    }
  }

  coreLog('Compared %d rows on %d fields, %d changed', edited.rows.length, comparedFields.length, changes.length);
  return changes;
};
