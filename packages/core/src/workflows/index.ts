export type { EditedRowInput, SaveEditsParams, SaveEditsResult, TableNames } from './save-edits.js';
export { baselineFor, buildEditedTable, DEFAULT_TABLE_NAMES, saveEdits } from './save-edits.js';
export type { ImportPreview } from './tables.js';
export { exportMasterCsv, importMasterCsv, loadAuditLog, loadMasterTable, previewImport } from './tables.js';
