/** @jwp-tracker/core - Change tracking and audit trail for the JWP activity table */

// Audit Log Codec
export { describeFieldChange, parseAuditLog, parseChangesCell, toAuditLogRow } from './audit-log/codec.js';
// Constants
export {
  ADMIN_ACTOR,
  AUDIT_LOG_HEADER,
  COLUMN,
  DEFAULTS,
  MASTER_COLUMNS,
  OPTIONAL_IMPORT_DEFAULTS,
  REQUIRED_IMPORT_COLUMNS,
  STAKEHOLDER_EDITABLE_FIELDS,
} from './constants.js';
// CSV
export { parseCsv, serializeCsv } from './csv/codec.js';
export { prepareImport } from './csv/import.js';
// Domain - Branded Types
export type { RowId } from './domain/branded-types.js';
export { createRowId, IdValidationError, isRowId, rowIdFromIndex, unwrapId } from './domain/branded-types.js';
// Domain - Change Types
export type { AuditLogEntry, ChangeRecord, FieldChange, RowChange } from './domain/change-types.js';
// Domain - Smart Constructors
export type { Result, StakeholderInput, ValidationIssue } from './domain/smart-constructors.js';
export { createAdminActor, createStakeholderActor, failure, success } from './domain/smart-constructors.js';
// Domain - Tables
export type { CellValue, Row, RowIdentifier, Table, TableRow } from './domain/table.js';
export {
  createTable,
  defaultRowIdentifier,
  emptyMasterTable,
  filterByAgency,
  indexRows,
  listAgencies,
  tableFromMatrix,
  tableToMatrix,
} from './domain/table.js';
// Errors
export type { ShapeMismatchReason } from './errors.js';
export {
  ConfigurationError,
  CsvValidationError,
  normalizeError,
  NotFoundError,
  ShapeMismatchError,
  StoreUnavailableError,
} from './errors.js';
// Interfaces
export type { RecordStore } from './interfaces/index.js';
// Tracker
export type {
  ApplyChangesOptions,
  AuditEntryOptions,
  ChangeTracker,
  ChangeTrackerConfig,
  RowLabeler,
} from './tracker/index.js';
export {
  applyChanges,
  computeChanges,
  createChangeTracker,
  labelFromTable,
  toAuditEntries,
  validateTrackerConfig,
} from './tracker/index.js';
// Types
export type { Actor, ActorRole } from './types.js';
// Utils - Debug
export { coreLog, csvLog, storeLog } from './utils/debug.js';
// Utils - Diff Calculator
export type { DiffCalculator, DiffResult } from './utils/diff-calculator.js';
export { areValuesEqual, createDiffCalculator } from './utils/diff-calculator.js';
// Utils - Display
export { formatTimestamp, toDisplayString } from './utils/display.js';
// Utils - Error Handler
export type { AuditFailure, ErrorHandler, ErrorStrategy } from './utils/error-handler.js';
export { attemptAuditWrite, createErrorHandler, ERROR_STRATEGIES } from './utils/error-handler.js';
// Workflows
export type { EditedRowInput, ImportPreview, SaveEditsParams, SaveEditsResult, TableNames } from './workflows/index.js';
export {
  baselineFor,
  buildEditedTable,
  DEFAULT_TABLE_NAMES,
  exportMasterCsv,
  importMasterCsv,
  loadAuditLog,
  loadMasterTable,
  previewImport,
  saveEdits,
} from './workflows/index.js';
