import 'dotenv/config';
import { serve } from '@hono/node-server';
import { createApi } from './api/index.js';
import { initializeDatabase, closeDatabase } from './db/index.js';
import { config, validateConfig } from './config.js';
import { createLogger } from './utils/logger.js';
import { usageTracker } from './services/ai/clients.js';
import { createServices } from './services/index.js';
import { startScheduler, stopScheduler } from './jobs/scheduler.js';

const logger = createLogger('server');

async function main() {
  logger.info('Starting thread relevance monitor');

  validateConfig();

  const db = initializeDatabase();
  const services = createServices(db);

  const app = createApi({
    monitor: services.monitor,
    store: services.store,
    digest: services.digest,
    digestRuns: services.digestRuns,
    usage: () => usageTracker.getStats(),
  });

  const server = serve({
    fetch: app.fetch,
    port: config.server.port,
    hostname: config.server.host,
  });

  logger.info(`Server running on http://${config.server.host}:${config.server.port}`);

  startScheduler(services);

  let shuttingDown = false;
  const shutdown = async (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info('Shutting down', { signal });
    try {
      await stopScheduler();
      server.close();
      closeDatabase();
      process.exit(0);
    } catch (error) {
      logger.error('Shutdown failed', { error });
      process.exit(1);
    }
  };

  process.on('SIGINT', () => void shutdown('SIGINT'));
  process.on('SIGTERM', () => void shutdown('SIGTERM'));
}

main().catch((error) => {
  logger.error('Failed to start server', { error });
  process.exit(1);
});
