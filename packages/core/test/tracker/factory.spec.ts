/**
 * createChangeTracker Tests
 */

import { describe, expect, it } from 'vitest';
import {
  ConfigurationError,
  createChangeTracker,
  STAKEHOLDER_EDITABLE_FIELDS,
  validateTrackerConfig,
} from '../../src/index.js';
import { createMasterTable, editRow, stakeholder } from '../helpers/fixtures.js';

const fixedClock = () => new Date('2024-03-05T14:07:09Z');

describe('createChangeTracker', () => {
  it('should run a full detect, record and apply cycle', () => {
    const tracker = createChangeTracker({ editableFields: STAKEHOLDER_EDITABLE_FIELDS, clock: fixedClock });
    const master = createMasterTable();
    const edited = editRow(master, 0, { 'Budget Spent': 250, Outcome: 'ignored' });

    const changes = tracker.computeChanges(master, edited);
    const records = tracker.toAuditEntries(changes, stakeholder, master);
    const updated = tracker.applyChanges(master, changes);

    expect(changes).toHaveLength(1);
    expect(records).toHaveLength(1);
    expect(records[0]?.rowLabel).toBe('A1');
    expect(records[0]?.timestamp).toBe('2024-03-05 14:07:09');
    expect(updated.rows[0]?.values.Outcome).toBe('Outcome 1');
    expect(updated.rows[0]?.values['Budget Spent']).toBe(250);
    expect(updated.rows[0]?.values['Last Updated']).toBe('2024-03-05 14:07:09');
  });

  it('should use an explicit moment over the clock', () => {
    const tracker = createChangeTracker({ editableFields: ['Budget Spent'], clock: fixedClock });
    const master = createMasterTable();
    const changes = tracker.computeChanges(master, editRow(master, 1, { 'Budget Spent': 60 }));

    const updated = tracker.applyChanges(master, changes, new Date('2025-01-01T09:30:00Z'));

    expect(updated.rows[1]?.values['Last Updated']).toBe('2025-01-01 09:30:00');
  });

  it('should expose its configuration', () => {
    const tracker = createChangeTracker({ editableFields: ['Budget Spent', 'Budget Spent'] });

    expect([...tracker.editableFields]).toEqual(['Budget Spent']);
    expect(tracker.lastUpdatedField).toBe('Last Updated');
    expect(tracker.labelField).toBe('Activity');
  });

  it('should reject the last-updated field as editable', () => {
    expect(() => createChangeTracker({ editableFields: ['Budget Spent', 'Last Updated'] })).toThrow(ConfigurationError);
  });

  it('should name every conflicting field', () => {
    expect(() => validateTrackerConfig(new Set(['Activity', 'Modified']), 'Modified', 'Activity')).toThrow(
      'Configuration error: Fields managed by the tracker cannot be editable. Conflicting fields: Modified, Activity',
    );
  });
});
