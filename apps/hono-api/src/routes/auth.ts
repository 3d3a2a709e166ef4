/**
 * Login gate
 *
 * Stakeholders identify themselves with name, email and agency; the admin with the shared
 * password from the configuration.
 */

import { createAdminActor, createStakeholderActor, listAgencies, loadMasterTable } from '@jwp-tracker/core';
import { Hono } from 'hono';
import { HTTPException } from 'hono/http-exception';
import { z } from 'zod';
import { httpLog } from '../debug.js';
import type { AppEnv, RouteDependencies } from '../env.js';
import { endSession, startSession } from '../middleware/session.js';
import { readJsonBody } from '../request.js';

const stakeholderLoginSchema = z.object({
  name: z.string().optional(),
  email: z.string().optional(),
  agency: z.string().optional(),
});

const adminLoginSchema = z.object({
  password: z.string().optional(),
});

export const createAuthRoutes = ({ store, config, sessions }: RouteDependencies) => {
  const routes = new Hono<AppEnv>();

  routes.get('/agencies', async (c) => {
    const master = await loadMasterTable(store, config.tables.data);
    return c.json({ agencies: listAgencies(master) });
  });

  routes.post('/login/stakeholder', async (c) => {
    const input = await readJsonBody(c, stakeholderLoginSchema, 'Please fill in all fields.');
    const result = createStakeholderActor(input);
    if (!result.success) {
      throw new HTTPException(400, { message: 'Please fill in all fields.' });
    }

    const agencies = listAgencies(await loadMasterTable(store, config.tables.data));
    if (!agencies.includes(result.value.agency)) {
      throw new HTTPException(400, { message: `Agency '${result.value.agency}' is not listed in the master data.` });
    }

    const session = sessions.create(result.value);
    startSession(c, session);
    httpLog('Stakeholder %s logged in for %s', result.value.email, result.value.agency);
    return c.json({ actor: session.actor });
  });

  routes.post('/login/admin', async (c) => {
    const { password } = await readJsonBody(c, adminLoginSchema, 'Please enter the admin password.');
    if (config.adminPassword === undefined) {
      throw new HTTPException(503, { message: 'Admin password is not configured on the server.' });
    }
    if (password !== config.adminPassword) {
      throw new HTTPException(401, { message: 'Incorrect admin password.' });
    }

    const session = sessions.create(createAdminActor());
    startSession(c, session);
    httpLog('Admin logged in');
    return c.json({ actor: session.actor });
  });

  routes.post('/logout', (c) => {
    endSession(c, sessions);
    return c.json({ ok: true });
  });

  return routes;
};
