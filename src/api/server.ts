import { serve, type ServerType } from '@hono/node-server';
import type { ActivityStore } from '../activities/activity-store.js';
import { logger } from '../utils/logger.js';
import { createApp } from './app.js';

export interface ApiServerOptions {
  port: number;
  staticRoot: string;
  corsOrigin: string;
}

export function startApiServer(store: ActivityStore, options: ApiServerOptions): ServerType {
  const app = createApp({ store, staticRoot: options.staticRoot, corsOrigin: options.corsOrigin });

  return serve({ fetch: app.fetch, port: options.port }, (info) => {
    logger.success('API', `Activities API: http://localhost:${info.port}`);
  });
}

export function stopApiServer(server: ServerType): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((err) => (err ? reject(err) : resolve()));
  });
}
