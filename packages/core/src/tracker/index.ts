export type { ApplyChangesOptions } from './apply-changes.js';
export { applyChanges } from './apply-changes.js';
export type { AuditEntryOptions, RowLabeler } from './audit-entries.js';
export { labelFromTable, toAuditEntries } from './audit-entries.js';
export { computeChanges } from './compute-changes.js';
export type { ChangeTracker, ChangeTrackerConfig } from './factory.js';
export { createChangeTracker, validateTrackerConfig } from './factory.js';
