/**
 * Hono Server Entry Point
 */

import { serve } from '@hono/node-server';
import { createApp } from './app.js';
import { loadConfig } from './config.js';
import { createStoreFromConfig } from './store.js';

const config = loadConfig(process.env);
const app = createApp({ store: createStoreFromConfig(config), config });

console.log(`🚀 JWP tracker starting on http://localhost:${config.port}`);
if (config.adminPassword === undefined) {
  console.log('⚠️  ADMIN_PASSWORD is not set; admin login is disabled');
}

serve({
  fetch: app.fetch,
  port: config.port,
});
