/**
 * Hono Application - Routes and Middleware
 */

import type { ChangeTracker, RecordStore } from '@jwp-tracker/core';
import { createChangeTracker, STAKEHOLDER_EDITABLE_FIELDS } from '@jwp-tracker/core';
import { Hono } from 'hono';
import { HTTPException } from 'hono/http-exception';
import type { AppConfig } from './config.js';
import { httpLog } from './debug.js';
import type { AppEnv, RouteDependencies } from './env.js';
import { statusForError } from './errors.js';
import { sessionMiddleware } from './middleware/session.js';
import { createActivityRoutes } from './routes/activities.js';
import { createAdminRoutes } from './routes/admin.js';
import { createAuthRoutes } from './routes/auth.js';
import type { SessionRegistry } from './session.js';
import { createSessionRegistry } from './session.js';

export interface AppOptions {
  store: RecordStore;
  config: AppConfig;
  sessions?: SessionRegistry;
  /** Defaults to the stakeholder-editable fields and the system clock */
  tracker?: ChangeTracker;
}

export const createApp = (options: AppOptions) => {
  const deps: RouteDependencies = {
    store: options.store,
    config: options.config,
    sessions: options.sessions ?? createSessionRegistry(),
    tracker: options.tracker ?? createChangeTracker({ editableFields: STAKEHOLDER_EDITABLE_FIELDS }),
  };

  const app = new Hono<AppEnv>();

  app.use('*', async (c, next) => {
    await next();
    httpLog('%s %s -> %d', c.req.method, c.req.path, c.res.status);
  });
  app.use('*', sessionMiddleware(deps.sessions));

  app.get('/health', (c) => {
    return c.json({ ok: true });
  });

  app.route('/', createAuthRoutes(deps));
  app.route('/', createActivityRoutes(deps));
  app.route('/admin', createAdminRoutes(deps));

  app.notFound((c) => c.json({ error: 'Not found' }, 404));

  app.onError((error, c) => {
    if (error instanceof HTTPException) {
      return c.json({ error: error.message }, error.status);
    }

    const status = statusForError(error);
    if (status === 500) {
      console.error(`[@jwp-tracker] Unhandled error on ${c.req.method} ${c.req.path}:`, error.message);
      if (error.stack) {
        console.error(error.stack);
      }
      return c.json({ error: 'Internal server error' }, 500);
    }
    return c.json({ error: error.message }, status);
  });

  return app;
};
