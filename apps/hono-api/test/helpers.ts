/**
 * Test Utility Functions
 */

import type { CellValue } from '@jwp-tracker/core';
import { createChangeTracker, createTable, MASTER_COLUMNS, STAKEHOLDER_EDITABLE_FIELDS } from '@jwp-tracker/core';
import type { InMemoryRecordStore } from '@jwp-tracker/core/testing';
import { createInMemoryRecordStore } from '@jwp-tracker/core/testing';
import { createApp } from '../src/app.js';
import type { AppConfig } from '../src/config.js';
import { loadConfig } from '../src/config.js';
import type { SessionRegistry } from '../src/session.js';
import { createSessionRegistry } from '../src/session.js';

export const FIXED_NOW = new Date(Date.UTC(2024, 6, 1, 9, 30, 0));

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

export interface TestContext {
  app: ReturnType<typeof createApp>;
  store: InMemoryRecordStore;
  sessions: SessionRegistry;
  config: AppConfig;
}

export const setupApp = (env: Record<string, string> = { ADMIN_PASSWORD: 'test-secret' }): TestContext => {
  const store = createInMemoryRecordStore();
  store.seed('Sheet1', createTable(MASTER_COLUMNS, masterRecords));
  const sessions = createSessionRegistry();
  const config = loadConfig(env);
  const tracker = createChangeTracker({
    editableFields: STAKEHOLDER_EDITABLE_FIELDS,
    clock: () => FIXED_NOW,
  });

  return { app: createApp({ store, config, sessions, tracker }), store, sessions, config };
};

export const jsonRequest = (method: string, body: unknown, cookie?: string): RequestInit => ({
  method,
  headers: {
    'Content-Type': 'application/json',
    ...(cookie === undefined ? {} : { Cookie: cookie }),
  },
  body: JSON.stringify(body),
});

/** The `name=value` pair of the session cookie set by a response */
export const sessionCookie = (res: Response): string => {
  const header = res.headers.get('set-cookie');
  if (!header) {
    throw new Error('Response did not set a cookie');
  }
  return header.split(';')[0] ?? '';
};

export const loginAsStakeholder = async (
  app: TestContext['app'],
  input = { name: 'Jane Doe', email: 'jane@example.org', agency: 'WHO' },
): Promise<string> => {
  const res = await app.request('/login/stakeholder', jsonRequest('POST', input));
  return sessionCookie(res);
};

export const loginAsAdmin = async (app: TestContext['app']): Promise<string> => {
  const res = await app.request('/login/admin', jsonRequest('POST', { password: 'test-secret' }));
  return sessionCookie(res);
};
