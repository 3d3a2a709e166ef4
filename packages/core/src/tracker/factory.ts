/**
 * Change Tracker factory
 *
 * @module tracker/factory
 */

import { DEFAULTS } from '../constants.js';
import type { ChangeRecord, RowChange } from '../domain/change-types.js';
import type { RowIdentifier, Table } from '../domain/table.js';
import { defaultRowIdentifier } from '../domain/table.js';
import { ConfigurationError } from '../errors.js';
import type { Actor } from '../types.js';
import { applyChanges } from './apply-changes.js';
import { labelFromTable, toAuditEntries } from './audit-entries.js';
import { computeChanges } from './compute-changes.js';

export interface ChangeTrackerConfig {
  /** Columns the actor may change */
  editableFields: Iterable<string>;
  /** Column stamped on every changed row (default: 'Last Updated') */
  lastUpdatedField?: string;
  /** Column written to the audit log as the row label (default: 'Activity') */
  labelField?: string;
  rowIdentifier?: RowIdentifier;
  /** Clock used when no explicit moment is passed (default: `() => new Date()`) */
  clock?: () => Date;
}

/**
 * Stateless change tracker bound to one editable field set
 *
 * Every method is a pure function of its arguments and the configuration.
 */
export interface ChangeTracker {
  readonly editableFields: ReadonlySet<string>;
  readonly lastUpdatedField: string;
  readonly labelField: string;
  now(): Date;
  computeChanges(baseline: Table, edited: Table): RowChange[];
  applyChanges(master: Table, changes: readonly RowChange[], now?: Date): Table;
  toAuditEntries(changes: readonly RowChange[], actor: Actor, baseline: Table, now?: Date): ChangeRecord[];
}

/**
 * Validates that the editable set leaves the tracker's own columns alone
 *
 * @throws {ConfigurationError} If the last-updated or label field is declared editable
 *
 * @remarks
 * The last-updated field is written by the tracker itself, and the label field is what
 * audit entries are identified by, so neither may be changed by an actor.
 */
export const validateTrackerConfig = (
  editableFields: ReadonlySet<string>,
  lastUpdatedField: string,
  labelField: string,
): void => {
  const conflicts = [lastUpdatedField, labelField].filter((field) => editableFields.has(field));
  if (conflicts.length > 0) {
    throw new ConfigurationError(
      `Fields managed by the tracker cannot be editable. Conflicting fields: ${conflicts.join(', ')}`,
    );
  }
};

/**
 * Creates a change tracker
 *
 * @example
 * ```typescript
 * const tracker = createChangeTracker({ editableFields: STAKEHOLDER_EDITABLE_FIELDS });
 *
 * const changes = tracker.computeChanges(baseline, edited);
 * const now = tracker.now();
 * const records = tracker.toAuditEntries(changes, actor, baseline, now);
 * const updated = tracker.applyChanges(master, changes, now);
 * ```
 */
export const createChangeTracker = (config: ChangeTrackerConfig): ChangeTracker => {
  const editableFields: ReadonlySet<string> = new Set(config.editableFields);
  const lastUpdatedField = config.lastUpdatedField ?? DEFAULTS.LAST_UPDATED_FIELD;
  const labelField = config.labelField ?? DEFAULTS.LABEL_FIELD;
  const rowIdentifier = config.rowIdentifier ?? defaultRowIdentifier;
  const clock = config.clock ?? (() => new Date());

  validateTrackerConfig(editableFields, lastUpdatedField, labelField);

  return {
    editableFields,
    lastUpdatedField,
    labelField,
    now: clock,
    computeChanges: (baseline, edited) => computeChanges(baseline, edited, editableFields, rowIdentifier),
    applyChanges: (master, changes, now = clock()) =>
      applyChanges(master, changes, { now, lastUpdatedField, rowIdentifier }),
    toAuditEntries: (changes, actor, baseline, now = clock()) =>
      toAuditEntries(changes, actor, { now, labelFor: labelFromTable(baseline, labelField, rowIdentifier) }),
  };
};
