/**
 * Save workflow Tests
 */

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import type { Actor, ChangeTracker } from '../../src/index.js';
import {
  AUDIT_LOG_HEADER,
  baselineFor,
  buildEditedTable,
  createChangeTracker,
  createErrorHandler,
  createRowId,
  saveEdits,
  ShapeMismatchError,
  STAKEHOLDER_EDITABLE_FIELDS,
  StoreUnavailableError,
} from '../../src/index.js';
import type { InMemoryRecordStore } from '../../src/testing/index.js';
import { createInMemoryRecordStore } from '../../src/testing/index.js';
import { createMasterTable, stakeholder } from '../helpers/fixtures.js';

const admin: Actor = { name: 'Admin', email: 'admin@system', agency: 'All', role: 'admin' };

describe('saveEdits', () => {
  let store: InMemoryRecordStore;
  let tracker: ChangeTracker;

  beforeEach(() => {
    store = createInMemoryRecordStore();
    store.seed('Sheet1', createMasterTable());
    tracker = createChangeTracker({
      editableFields: STAKEHOLDER_EDITABLE_FIELDS,
      clock: () => new Date('2024-03-05T14:07:09Z'),
    });
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should save a change and append one audit row', async () => {
    const result = await saveEdits({
      store,
      tracker,
      actor: stakeholder,
      rows: [{ id: '0', values: { 'Budget Spent': 250 } }],
    });

    expect(result.status).toBe('saved');
    if (result.status === 'saved') {
      expect(result.changes).toEqual([{ rowId: '0', fields: { 'Budget Spent': { before: 100, after: 250 } } }]);
      expect(result.auditFailures).toBe(0);
    }

    const master = store.snapshot('Sheet1');
    expect(master?.rows[0]?.values['Budget Spent']).toBe(250);
    expect(master?.rows[0]?.values['Last Updated']).toBe('2024-03-05 14:07:09');
    expect(master?.rows[1]).toEqual(createMasterTable().rows[1]);

    const auditLog = store.snapshot('Audit_Log');
    expect(auditLog?.columns).toEqual([...AUDIT_LOG_HEADER]);
    expect(auditLog?.rows.map((row) => row.values)).toEqual([
      {
        Timestamp: '2024-03-05 14:07:09',
        'User Name': 'Jane Doe',
        'User Email': 'jane@example.org',
        Agency: 'WHO',
        Activity: 'A1',
        Changes: '{"Budget Spent":"from \'100\' to \'250\'"}',
      },
    ]);
  });

  it('should write the master table before the audit log', async () => {
    await saveEdits({ store, tracker, actor: stakeholder, rows: [{ id: '2', values: { 'End Date': '2025-02-28' } }] });

    expect(store.calls).toEqual([
      { operation: 'fetchTable', tableName: 'Sheet1' },
      { operation: 'replaceAll', tableName: 'Sheet1' },
      { operation: 'appendRow', tableName: 'Audit_Log' },
    ]);
  });

  it('should append one audit row per changed row in row order', async () => {
    await saveEdits({
      store,
      tracker,
      actor: stakeholder,
      rows: [
        { id: '2', values: { 'Progress / Achievement to Date': 'Kick-off held' } },
        { id: '0', values: { 'Progress / Achievement to Date': 'Halfway' } },
      ],
    });

    expect(store.snapshot('Audit_Log')?.rows.map((row) => row.values.Activity)).toEqual(['A1', 'A2']);
  });

  it('should keep appending to an existing audit log', async () => {
    await saveEdits({ store, tracker, actor: stakeholder, rows: [{ id: '0', values: { 'Budget Spent': 150 } }] });
    await saveEdits({ store, tracker, actor: stakeholder, rows: [{ id: '0', values: { 'Budget Spent': 175 } }] });

    const auditLog = store.snapshot('Audit_Log');
    expect(auditLog?.rows).toHaveLength(2);
    expect(auditLog?.rows[1]?.values.Changes).toBe('{"Budget Spent":"from \'150\' to \'175\'"}');
  });

  it('should not touch the store when nothing changed', async () => {
    const result = await saveEdits({
      store,
      tracker,
      actor: stakeholder,
      rows: [{ id: '0', values: { 'Budget Spent': '100', 'Progress / Achievement to Date': 'Started' } }],
    });

    expect(result).toEqual({ status: 'unchanged' });
    expect(store.calls).toEqual([{ operation: 'fetchTable', tableName: 'Sheet1' }]);
    expect(store.snapshot('Audit_Log')).toBeUndefined();
  });

  it('should ignore submitted values of non-editable fields', async () => {
    const result = await saveEdits({
      store,
      tracker,
      actor: stakeholder,
      rows: [{ id: '0', values: { Outcome: 'Rewritten', Agency: 'UNICEF', 'Last Updated': '1999-01-01 00:00:00' } }],
    });

    expect(result).toEqual({ status: 'unchanged' });
    expect(store.snapshot('Sheet1')).toEqual(createMasterTable());
  });

  it("should reject rows of another agency without writing", async () => {
    await expect(
      saveEdits({ store, tracker, actor: stakeholder, rows: [{ id: '1', values: { 'Budget Spent': 1 } }] }),
    ).rejects.toThrow(ShapeMismatchError);

    expect(store.snapshot('Sheet1')).toEqual(createMasterTable());
    expect(store.calls.map((call) => call.operation)).toEqual(['fetchTable']);
  });

  it('should reject a row submitted twice', async () => {
    await expect(
      saveEdits({
        store,
        tracker,
        actor: stakeholder,
        rows: [
          { id: '0', values: { 'Budget Spent': 1 } },
          { id: '0', values: { 'Budget Spent': 2 } },
        ],
      }),
    ).rejects.toThrow('[ShapeMismatch] Row 0 was submitted more than once');
  });

  it('should surface a failed overwrite and skip the audit log', async () => {
    store.failNext('replaceAll', 'write rejected');

    await expect(
      saveEdits({ store, tracker, actor: stakeholder, rows: [{ id: '0', values: { 'Budget Spent': 250 } }] }),
    ).rejects.toThrow(StoreUnavailableError);

    expect(store.snapshot('Sheet1')).toEqual(createMasterTable());
    expect(store.snapshot('Audit_Log')).toBeUndefined();
  });

  it('should log a failed audit append and still report the save', async () => {
    const consoleErrorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    store.failNext('appendRow', 'quota exceeded');

    const result = await saveEdits({
      store,
      tracker,
      actor: stakeholder,
      rows: [{ id: '0', values: { 'Budget Spent': 250 } }],
    });

    expect(result.status).toBe('saved');
    if (result.status === 'saved') {
      expect(result.auditFailures).toBe(1);
    }
    expect(store.snapshot('Sheet1')?.rows[0]?.values['Budget Spent']).toBe(250);
    expect(consoleErrorSpy).toHaveBeenCalledWith(
      '[@jwp-tracker] Could not write to audit log for row 0:',
      'Record store unavailable during appendRow: quota exceeded',
    );
  });

  it('should fail on a failed audit append with the throw strategy and leave the master table alone', async () => {
    store.failNext('appendRow');

    await expect(
      saveEdits({
        store,
        tracker,
        actor: stakeholder,
        rows: [{ id: '0', values: { 'Budget Spent': 250 } }],
        errorHandler: createErrorHandler('throw'),
      }),
    ).rejects.toThrow('Record store unavailable during appendRow: simulated outage');

    expect(store.snapshot('Sheet1')).toEqual(createMasterTable());
    expect(store.calls.map((call) => call.operation)).toEqual(['fetchTable', 'appendRow']);
  });

  it('should write the audit log before the master table with the throw strategy', async () => {
    const result = await saveEdits({
      store,
      tracker,
      actor: stakeholder,
      rows: [{ id: '0', values: { 'Budget Spent': 250 } }],
      errorHandler: createErrorHandler('throw'),
    });

    expect(result).toMatchObject({ status: 'saved', auditFailures: 0 });
    expect(store.calls).toEqual([
      { operation: 'fetchTable', tableName: 'Sheet1' },
      { operation: 'appendRow', tableName: 'Audit_Log' },
      { operation: 'replaceAll', tableName: 'Sheet1' },
    ]);
    expect(store.snapshot('Sheet1')?.rows[0]?.values['Budget Spent']).toBe(250);
  });

  it('should refuse an edit whose row moved since it was read', async () => {
    const readRow = createMasterTable().rows[0];
    const reordered = createMasterTable();
    store.seed('Sheet1', {
      columns: reordered.columns,
      rows: [...reordered.rows].reverse().map((row, index) => ({ id: createRowId(String(index)), values: row.values })),
    });

    const saving = saveEdits({
      store,
      tracker,
      actor: stakeholder,
      rows: [{ id: '0', values: { ...readRow?.values, 'Budget Spent': 250 } }],
    });

    await expect(saving).rejects.toThrow(ShapeMismatchError);
    await expect(saving).rejects.toThrow(
      "[ShapeMismatch] Row 0 now holds 'A2', not 'A1'. Reload the activities and try again",
    );
    expect(store.snapshot('Sheet1')?.rows.map((row) => row.values['Budget Spent'])).toEqual([0, 50, 100]);
    expect(store.snapshot('Audit_Log')).toBeUndefined();
  });

  it('should read and write the configured tables', async () => {
    store.seed('Activities', createMasterTable());

    await saveEdits({
      store,
      tracker,
      actor: stakeholder,
      rows: [{ id: '0', values: { 'Budget Spent': 250 } }],
      tables: { data: 'Activities', auditLog: 'History' },
    });

    expect(store.snapshot('Activities')?.rows[0]?.values['Budget Spent']).toBe(250);
    expect(store.snapshot('History')?.rows).toHaveLength(1);
    expect(store.snapshot('Sheet1')).toEqual(createMasterTable());
  });
});

describe('baselineFor', () => {
  it("should restrict a stakeholder to their agency's rows", () => {
    expect(baselineFor(createMasterTable(), stakeholder).rows.map((row) => row.id)).toEqual(['0', '2']);
  });

  it('should give an admin every row', () => {
    expect(baselineFor(createMasterTable(), admin).rows).toHaveLength(3);
  });
});

describe('buildEditedTable', () => {
  it('should only take editable fields that were submitted', () => {
    const baseline = baselineFor(createMasterTable(), stakeholder);

    const edited = buildEditedTable(
      baseline,
      [{ id: '2', values: { 'Budget Spent': 40, Outcome: 'Renamed' } }],
      STAKEHOLDER_EDITABLE_FIELDS,
    );

    expect(edited.rows[0]).toBe(baseline.rows[0]);
    expect(edited.rows[1]?.values).toEqual({ ...baseline.rows[1]?.values, 'Budget Spent': 40 });
  });

  it('should accept a submitted label that matches the baseline row', () => {
    const baseline = baselineFor(createMasterTable(), stakeholder);

    const edited = buildEditedTable(
      baseline,
      [{ id: '0', values: { Activity: 'A1', 'Budget Spent': 120 } }],
      STAKEHOLDER_EDITABLE_FIELDS,
    );

    expect(edited.rows[0]?.values['Budget Spent']).toBe(120);
  });

  it('should reject a submitted label that differs from the baseline row', () => {
    const baseline = baselineFor(createMasterTable(), stakeholder);

    try {
      buildEditedTable(baseline, [{ id: '2', values: { Activity: 'A1' } }], STAKEHOLDER_EDITABLE_FIELDS);
      expect.unreachable('buildEditedTable should have thrown');
    } catch (error) {
      expect(error).toBeInstanceOf(ShapeMismatchError);
      if (error instanceof ShapeMismatchError) {
        expect(error.reason).toBe('stale-row');
      }
    }
  });

  it('should reject rows outside the baseline', () => {
    const baseline = baselineFor(createMasterTable(), stakeholder);

    expect(() => buildEditedTable(baseline, [{ id: '9', values: {} }], STAKEHOLDER_EDITABLE_FIELDS)).toThrow(
      '[ShapeMismatch] Row 9 is not one of the rows open for editing',
    );
  });
});
