/**
 * HTTP server entry point.
 */

import { serve } from '@hono/node-server';
import { createBridgeApp, createBridgeRuntime } from './app.js';
import { loadConfigFromEnv } from './config.js';
import { getLogger } from './logging.js';

async function main(): Promise<void> {
  const logger = getLogger();
  const config = loadConfigFromEnv();
  const { bridge, storage } = await createBridgeRuntime(config, { logger });
  const app = createBridgeApp({ bridge, storage, hostToken: config.hostToken, logger });

  const server = serve({ fetch: app.fetch, port: config.port }, (info) => {
    logger.info(
      { port: info.port, storage: config.dbPath ? 'sqlite' : 'memory', hostAuth: Boolean(config.hostToken) },
      'Grading bridge listening'
    );
  });

  const shutdown = (signal: string): void => {
    logger.info({ signal }, 'Shutting down');
    server.close(() => {
      storage.close().then(
        () => process.exit(0),
        (err: unknown) => {
          logger.error({ err }, 'Failed to close storage');
          process.exit(1);
        }
      );
    });
  };
  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

main().catch((err: unknown) => {
  getLogger().fatal({ err }, 'Grading bridge failed to start');
  process.exit(1);
});
