/** Constants and Configuration Values for the JWP Tracker */

/** Columns of the master activities table, in sheet order */
export const MASTER_COLUMNS = [
  'Outcome',
  'Sub-Output',
  'Agency',
  'Activity',
  'End Date',
  'Budget Spent',
  'Progress / Achievement to Date',
  'Last Updated',
] as const;

/** Column names that carry meaning for the tracker itself */
export const COLUMN = {
  OUTCOME: 'Outcome',
  SUB_OUTPUT: 'Sub-Output',
  AGENCY: 'Agency',
  ACTIVITY: 'Activity',
  END_DATE: 'End Date',
  BUDGET_SPENT: 'Budget Spent',
  PROGRESS: 'Progress / Achievement to Date',
  LAST_UPDATED: 'Last Updated',
} as const satisfies Record<string, (typeof MASTER_COLUMNS)[number]>;

/** Fields a stakeholder may change on their agency's activities */
export const STAKEHOLDER_EDITABLE_FIELDS: ReadonlySet<string> = new Set([
  COLUMN.END_DATE,
  COLUMN.BUDGET_SPENT,
  COLUMN.PROGRESS,
]);

/** Header of the append-only audit log table */
export const AUDIT_LOG_HEADER = ['Timestamp', 'User Name', 'User Email', 'Agency', 'Activity', 'Changes'] as const;

/** Columns a CSV import must carry */
export const REQUIRED_IMPORT_COLUMNS = [COLUMN.OUTCOME, COLUMN.SUB_OUTPUT, COLUMN.AGENCY, COLUMN.ACTIVITY] as const;

/** Columns added to a CSV import when absent, with the value every row receives */
export const OPTIONAL_IMPORT_DEFAULTS = [
  [COLUMN.END_DATE, null],
  [COLUMN.BUDGET_SPENT, 0],
  [COLUMN.PROGRESS, ''],
  [COLUMN.LAST_UPDATED, null],
] as const;

/** Default configuration values */
export const DEFAULTS = {
  DATA_TABLE: 'Sheet1',
  AUDIT_LOG_TABLE: 'Audit_Log',
  LAST_UPDATED_FIELD: COLUMN.LAST_UPDATED,
  LABEL_FIELD: COLUMN.ACTIVITY,
  GROUP_FIELD: COLUMN.AGENCY,
  EXPORT_FILE_NAME: 'JWP_master_data_updated.csv',
  AUDIT_LOG_SHEET_ROWS: 1000,
} as const;

/** Identity used for admin sessions */
export const ADMIN_ACTOR = {
  name: 'Admin',
  email: 'admin@system',
  agency: 'All',
  role: 'admin',
} as const;
