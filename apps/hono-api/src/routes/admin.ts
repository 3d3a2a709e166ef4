/**
 * Admin tools: CSV export, audit log review and master data import
 */

import { DEFAULTS, exportMasterCsv, importMasterCsv, loadAuditLog, previewImport } from '@jwp-tracker/core';
import { Hono } from 'hono';
import { httpLog } from '../debug.js';
import type { AppEnv, RouteDependencies } from '../env.js';
import { requireAdmin } from '../middleware/session.js';

export const createAdminRoutes = ({ store, config }: RouteDependencies) => {
  const routes = new Hono<AppEnv>();

  routes.use('*', requireAdmin);

  routes.get('/export.csv', async (c) => {
    const csv = await exportMasterCsv(store, config.tables.data);
    return c.body(csv, 200, {
      'Content-Type': 'text/csv; charset=utf-8',
      'Content-Disposition': `attachment; filename="${DEFAULTS.EXPORT_FILE_NAME}"`,
    });
  });

  routes.get('/audit-log', async (c) => {
    const entries = await loadAuditLog(store, config.tables.auditLog);
    return c.json({
      entries,
      ...(entries.length === 0 ? { message: 'The audit log is currently empty.' } : {}),
    });
  });

  // Without ?confirm=true the upload is only validated.
  routes.post('/import', async (c) => {
    const csvText = await c.req.text();

    if (c.req.query('confirm') !== 'true') {
      const preview = previewImport(csvText);
      return c.json({ confirmed: false, columns: preview.columns, rowCount: preview.rowCount });
    }

    const imported = await importMasterCsv(store, csvText, config.tables.data);
    httpLog('Master data overwritten with %d rows', imported.rowCount);
    return c.json({
      confirmed: true,
      columns: imported.columns,
      rowCount: imported.rowCount,
      message: 'Successfully overwrote the master data.',
    });
  });

  return routes;
};
