import { config } from './config.js';
import { ActivityStore } from './activities/activity-store.js';
import { loadSeedActivities } from './activities/seed-loader.js';
import { startApiServer, stopApiServer } from './api/server.js';
import { logger, setLogLevel } from './utils/logger.js';
import type { ServerType } from '@hono/node-server';

let server: ServerType | undefined;
let isShuttingDown = false;

async function main() {
  setLogLevel(config.LOG_LEVEL);
  logger.info('SYSTEM', '=== Mergington High School Activities ===');

  const seed = await loadSeedActivities(config.ACTIVITIES_FILE);
  const store = new ActivityStore(seed, { enforceCapacity: config.ENFORCE_CAPACITY });
  logger.info(
    'SYSTEM',
    `${Object.keys(seed).length} activities, capacity ${store.capacityEnforced ? 'enforced' : 'advisory'}`,
  );

  server = startApiServer(store, {
    port: config.API_PORT,
    staticRoot: config.STATIC_ROOT,
    corsOrigin: config.CORS_ORIGIN,
  });
}

// SIGINT/SIGTERM
async function shutdown() {
  if (isShuttingDown) return;
  isShuttingDown = true;
  logger.info('SYSTEM', 'Shutting down...');
  try {
    if (server) await stopApiServer(server);
  } catch (err) {
    logger.error('SYSTEM', 'Server close failed', err);
    process.exit(1);
  }
  logger.info('SYSTEM', 'Goodbye!');
  process.exit(0);
}

process.on('SIGINT', () => void shutdown());
process.on('SIGTERM', () => void shutdown());

main().catch((err: unknown) => {
  logger.error('SYSTEM', `Startup failed: ${err instanceof Error ? err.message : String(err)}`, err);
  process.exit(1);
});
