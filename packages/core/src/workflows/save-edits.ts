/**
 * Save workflow for a stakeholder's edits
 *
 * @module workflows/save-edits
 *
 * @remarks
 * fetch master → restrict to the actor's rows → overlay submitted edits → detect changes
 * → overwrite the master table and append one audit row per changed row. The error
 * handler decides the order of the last two steps (see `createErrorHandler`).
 *
 * The master table is fetched again at save time, so a concurrent save by another actor
 * between two fetches is overwritten (last whole-table write wins).
 */

import { AUDIT_LOG_HEADER, DEFAULTS } from '../constants.js';
import { unwrapId } from '../domain/branded-types.js';
import type { ChangeRecord, RowChange } from '../domain/change-types.js';
import type { CellValue, Table, TableRow } from '../domain/table.js';
import { filterByAgency } from '../domain/table.js';
import { toAuditLogRow } from '../audit-log/codec.js';
import { ShapeMismatchError } from '../errors.js';
import type { RecordStore } from '../interfaces/record-store.js';
import type { ChangeTracker } from '../tracker/factory.js';
import type { Actor } from '../types.js';
import { coreLog } from '../utils/debug.js';
import { toDisplayString } from '../utils/display.js';
import type { ErrorHandler } from '../utils/error-handler.js';
import { attemptAuditWrite, createErrorHandler } from '../utils/error-handler.js';
import { loadMasterTable } from './tables.js';

/** A row as submitted from the editing surface */
export interface EditedRowInput {
  id: string;
  values: Record<string, CellValue>;
}

/** Names of the tables a workflow reads and writes */
export interface TableNames {
  data: string;
  auditLog: string;
}

export const DEFAULT_TABLE_NAMES: TableNames = {
  data: DEFAULTS.DATA_TABLE,
  auditLog: DEFAULTS.AUDIT_LOG_TABLE,
};

export interface SaveEditsParams {
  store: RecordStore;
  tracker: ChangeTracker;
  actor: Actor;
  rows: readonly EditedRowInput[];
  tables?: TableNames;
  /** Applied to audit append failures and deciding the write order (default: 'log' strategy) */
  errorHandler?: ErrorHandler;
}

export type SaveEditsResult =
  | { status: 'unchanged' }
  | { status: 'saved'; changes: RowChange[]; records: ChangeRecord[]; auditFailures: number };

/** Rows an actor is allowed to see and edit */
export const baselineFor = (master: Table, actor: Actor): Table => {
  return actor.role === 'admin' ? master : filterByAgency(master, actor.agency);
};

/**
 * Overlays submitted rows onto the baseline
 *
 * @remarks
 * Only editable fields are taken from the submission; anything else the client sends is
 * ignored, so the result always has the baseline's rows and columns. A submitted row that
 * carries the label field must still match the baseline row under the same id: row ids are
 * positions, and the master table may have been reordered or re-imported since the read.
 *
 * @throws {ShapeMismatchError} If a submitted row is duplicated, not part of the baseline,
 * or labeled differently from the baseline row
 */
export const buildEditedTable = (
  baseline: Table,
  rows: readonly EditedRowInput[],
  editableFields: ReadonlySet<string>,
  labelField: string = DEFAULTS.LABEL_FIELD,
): Table => {
  const submitted = new Map<string, EditedRowInput>();
  for (const row of rows) {
    if (submitted.has(row.id)) {
      throw new ShapeMismatchError('duplicate-row', `Row ${row.id} was submitted more than once`);
    }
    submitted.set(row.id, row);
  }

  const baselineIds = new Set<string>(baseline.rows.map((row) => unwrapId(row.id)));
  for (const id of submitted.keys()) {
    if (!baselineIds.has(id)) {
      throw new ShapeMismatchError('extra-row', `Row ${id} is not one of the rows open for editing`);
    }
  }

  const editableColumns = baseline.columns.filter((column) => editableFields.has(column));

  return {
    columns: baseline.columns,
    rows: baseline.rows.map((row): TableRow => {
      const input = submitted.get(unwrapId(row.id));
      if (!input) {
        return row;
      }
      if (Object.hasOwn(input.values, labelField)) {
        const submittedLabel = toDisplayString(input.values[labelField]);
        const currentLabel = toDisplayString(row.values[labelField]);
        if (submittedLabel !== currentLabel) {
          throw new ShapeMismatchError(
            'stale-row',
            `Row ${input.id} now holds '${currentLabel}', not '${submittedLabel}'. Reload the activities and try again`,
          );
        }
      }

      const values: Record<string, CellValue> = { ...row.values };
      for (const column of editableColumns) {
        if (Object.hasOwn(input.values, column)) {
          values[column] = input.values[column] ?? null;
        }
      }
      return { id: row.id, values };
    }),
  };
};

const appendAuditRecords = async (
  store: RecordStore,
  tableName: string,
  records: readonly ChangeRecord[],
  errorHandler: ErrorHandler,
): Promise<number> => {
  let failures = 0;
  for (const record of records) {
    const appended = await attemptAuditWrite(
      () => store.appendRow(tableName, AUDIT_LOG_HEADER, toAuditLogRow(record)),
      errorHandler,
      `row ${unwrapId(record.rowId)}`,
    );
    if (!appended) {
      failures += 1;
    }
  }
  return failures;
};

/**
 * Saves an actor's edits and records them in the audit log
 *
 * @returns `unchanged` when no editable field differs (the store is not written), otherwise
 * the detected changes and the audit records written for them
 *
 * @throws {ShapeMismatchError} If submitted rows do not belong to the actor's rows
 * @throws {NotFoundError | StoreUnavailableError} From the store, unchanged. With the `throw`
 * strategy a failed audit append is among them, and the master table is then left as it was
 *
 * @example
 * ```typescript
 * const result = await saveEdits({
 *   store,
 *   tracker: createChangeTracker({ editableFields: STAKEHOLDER_EDITABLE_FIELDS }),
 *   actor,
 *   rows: [{ id: '0', values: { 'Budget Spent': 250 } }],
 * });
 * ```
 */
export const saveEdits = async (params: SaveEditsParams): Promise<SaveEditsResult> => {
  const { store, tracker, actor, rows } = params;
  const tables = params.tables ?? DEFAULT_TABLE_NAMES;
  const errorHandler = params.errorHandler ?? createErrorHandler('log');

  const master = await loadMasterTable(store, tables.data);
  const baseline = baselineFor(master, actor);
  const edited = buildEditedTable(baseline, rows, tracker.editableFields, tracker.labelField);

  const changes = tracker.computeChanges(baseline, edited);
  if (changes.length === 0) {
    coreLog('No changes detected for %s (%s)', actor.email, actor.agency);
    return { status: 'unchanged' };
  }

  const now = tracker.now();
  const records = tracker.toAuditEntries(changes, actor, baseline, now);
  const updated = tracker.applyChanges(master, changes, now);

  let auditFailures = 0;
  if (errorHandler.auditFirst) {
    await appendAuditRecords(store, tables.auditLog, records, errorHandler);
    await store.replaceAll(tables.data, updated);
  } else {
    await store.replaceAll(tables.data, updated);
    auditFailures = await appendAuditRecords(store, tables.auditLog, records, errorHandler);
  }
  coreLog('Saved %d changed rows for %s (%s)', changes.length, actor.email, actor.agency);

  return { status: 'saved', changes, records, auditFailures };
};

