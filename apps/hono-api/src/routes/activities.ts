/**
 * Activity table for the logged-in actor
 *
 * Stakeholders see and edit their agency's rows; the admin sees every row read-only.
 */

import type { ChangeRecord } from '@jwp-tracker/core';
import { baselineFor, COLUMN, createErrorHandler, loadMasterTable, saveEdits, unwrapId } from '@jwp-tracker/core';
import { Hono } from 'hono';
import { HTTPException } from 'hono/http-exception';
import { z } from 'zod';
import { httpLog } from '../debug.js';
import type { AppEnv, RouteDependencies } from '../env.js';
import { requireSession } from '../middleware/session.js';
import { readJsonBody } from '../request.js';

const cellSchema = z.union([z.string(), z.number(), z.null()]);

const saveRequestSchema = z.object({
  rows: z.array(
    z.object({
      id: z.string(),
      values: z.record(cellSchema),
    }),
  ),
});

type SaveRequest = z.infer<typeof saveRequestSchema>;

const isCalendarDay = (text: string): boolean => {
  const match = /^(\d{4})-(\d{2})-(\d{2})$/.exec(text);
  if (!match) {
    return false;
  }
  const [year, month, day] = [Number(match[1]), Number(match[2]), Number(match[3])];
  const date = new Date(Date.UTC(year, month - 1, day));
  return date.getUTCFullYear() === year && date.getUTCMonth() === month - 1 && date.getUTCDate() === day;
};

/** Value shapes of the typed editable columns; `null` or `''` clears a cell */
const editableValueRules: Record<string, { schema: z.ZodTypeAny; expected: string }> = {
  [COLUMN.END_DATE]: {
    schema: z.union([z.string().refine(isCalendarDay), z.literal(''), z.null()]),
    expected: 'a date as YYYY-MM-DD',
  },
  [COLUMN.BUDGET_SPENT]: {
    schema: z.union([z.number().finite(), z.null()]),
    expected: 'a number',
  },
  [COLUMN.PROGRESS]: {
    schema: z.union([z.string(), z.null()]),
    expected: 'text',
  },
};

/** @throws {HTTPException} 400 naming the first value of the wrong shape */
const checkEditableValues = (rows: SaveRequest['rows']): void => {
  for (const row of rows) {
    for (const [field, rule] of Object.entries(editableValueRules)) {
      if (Object.hasOwn(row.values, field) && !rule.schema.safeParse(row.values[field]).success) {
        throw new HTTPException(400, { message: `Invalid ${field} for row ${row.id}: expected ${rule.expected}.` });
      }
    }
  }
};

const describeRecord = (record: ChangeRecord) => ({
  timestamp: record.timestamp,
  rowId: unwrapId(record.rowId),
  activity: record.rowLabel,
  changes: record.changes,
});

export const createActivityRoutes = ({ store, config, tracker }: RouteDependencies) => {
  const routes = new Hono<AppEnv>();
  const auditErrorHandler = createErrorHandler(config.auditErrorStrategy);

  routes.get('/activities', async (c) => {
    const { actor } = requireSession(c);
    const master = await loadMasterTable(store, config.tables.data);
    const visible = baselineFor(master, actor);

    let message: string | undefined;
    if (master.rows.length === 0) {
      message = 'The master dataset is empty. The admin may need to upload the initial CSV.';
    } else if (visible.rows.length === 0) {
      message = 'No activities found for your agency.';
    }

    return c.json({
      columns: visible.columns,
      rows: visible.rows.map((row) => ({ id: unwrapId(row.id), values: row.values })),
      editableFields: actor.role === 'admin' ? [] : [...tracker.editableFields],
      ...(message === undefined ? {} : { message }),
    });
  });

  routes.put('/activities', async (c) => {
    const session = requireSession(c);
    if (session.actor.role !== 'stakeholder') {
      throw new HTTPException(403, { message: 'Only stakeholders can edit activities.' });
    }
    const { rows } = await readJsonBody(c, saveRequestSchema, 'Expected { rows: [{ id, values }] }.');
    checkEditableValues(rows);

    if (session.saving) {
      throw new HTTPException(409, { message: 'A save is already in progress for this session.' });
    }
    session.saving = true;
    try {
      const result = await saveEdits({
        store,
        tracker,
        actor: session.actor,
        rows,
        tables: config.tables,
        errorHandler: auditErrorHandler,
      });

      if (result.status === 'unchanged') {
        return c.json({ status: result.status, message: 'No changes were detected.' });
      }

      httpLog('%s saved %d rows (%d audit failures)', session.actor.email, result.records.length, result.auditFailures);
      return c.json({
        status: result.status,
        message: 'Your updates have been saved successfully!',
        changes: result.records.map(describeRecord),
        auditFailures: result.auditFailures,
      });
    } finally {
      session.saving = false;
    }
  });

  return routes;
};
