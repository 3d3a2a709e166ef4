/**
 * Shared test fixtures
 */

import type { Actor, CellValue, Table } from '../../src/index.js';
import { createTable, MASTER_COLUMNS } from '../../src/index.js';

export const masterRecords: Record<string, CellValue>[] = [
  {
    Outcome: 'Outcome 1',
    'Sub-Output': 'Sub 1.1',
    Agency: 'WHO',
    Activity: 'A1',
    'End Date': '2024-06-30',
    'Budget Spent': 100,
    'Progress / Achievement to Date': 'Started',
    'Last Updated': null,
  },
  {
    Outcome: 'Outcome 1',
    'Sub-Output': 'Sub 1.2',
    Agency: 'UNICEF',
    Activity: 'B1',
    'End Date': '2024-09-30',
    'Budget Spent': 50,
    'Progress / Achievement to Date': 'Planning',
    'Last Updated': null,
  },
  {
    Outcome: 'Outcome 2',
    'Sub-Output': 'Sub 2.1',
    Agency: 'WHO',
    Activity: 'A2',
    'End Date': null,
    'Budget Spent': 0,
    'Progress / Achievement to Date': '',
    'Last Updated': null,
  },
];

export const createMasterTable = (): Table => createTable(MASTER_COLUMNS, masterRecords);

export const stakeholder: Actor = {
  name: 'Jane Doe',
  email: 'jane@example.org',
  agency: 'WHO',
  role: 'stakeholder',
};

/** Returns a copy of the table with some fields of one row replaced */
export const editRow = (table: Table, rowIndex: number, values: Record<string, CellValue>): Table => ({
  columns: table.columns,
  rows: table.rows.map((row, index) => (index === rowIndex ? { id: row.id, values: { ...row.values, ...values } } : row)),
});
