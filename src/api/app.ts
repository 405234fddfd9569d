import { Hono } from 'hono';
import { cors } from 'hono/cors';
import { HTTPException } from 'hono/http-exception';
import { serveStatic } from '@hono/node-server/serve-static';
import type { ActivityStore } from '../activities/activity-store.js';
import { logger } from '../utils/logger.js';
import { createActivitiesRoutes } from './routes/activities.js';

export interface AppOptions {
  store: ActivityStore;
  staticRoot: string;
  corsOrigin?: string;
}

export const INDEX_PAGE = '/static/index.html';

export function createApp({ store, staticRoot, corsOrigin = '*' }: AppOptions) {
  const app = new Hono();

  app.use('*', cors({ origin: corsOrigin }));

  app.get('/', (c) => c.redirect(INDEX_PAGE, 307));

  app.route('/activities', createActivitiesRoutes(store));

  // Health check
  app.get('/health', (c) => c.json({ status: 'ok', uptime: process.uptime() }));

  // Front end
  app.use(
    '/static/*',
    serveStatic({
      root: staticRoot,
      rewriteRequestPath: (path) => path.replace(/^\/static/, ''),
    }),
  );

  app.onError((err, c) => {
    if (err instanceof HTTPException) return err.getResponse();
    logger.error('API', `${c.req.method} ${c.req.path} failed`, err);
    return c.text('Internal Server Error', 500);
  });

  return app;
}
