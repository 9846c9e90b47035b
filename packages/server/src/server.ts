import { createServer } from 'http';
import { createApp } from './app.js';
import { config } from './config/index.js';
import { createServiceClient } from './config/database.js';
import { createSupabaseStores } from './repositories/index.js';
import { logger } from './utils/logger.js';

/**
 * Start the server
 */
async function main(): Promise<void> {
  const stores = createSupabaseStores(createServiceClient());
  const httpServer = createServer(createApp(stores));

  httpServer.listen(config.port, () => {
    logger.info({ port: config.port, env: config.env }, 'Server started');

    if (config.isDevelopment) {
      logger.info(`API available at http://localhost:${config.port}${config.apiPrefix}`);
      logger.info(`Health check: http://localhost:${config.port}${config.apiPrefix}/health`);
    }
  });

  // Graceful shutdown
  const shutdown = (signal: string) => {
    logger.info({ signal }, 'Shutdown signal received');

    httpServer.close(() => {
      logger.info('HTTP server closed');
      process.exit(0);
    });

    // Force exit after 10 seconds
    setTimeout(() => {
      logger.warn('Forcing shutdown after timeout');
      process.exit(1);
    }, 10000).unref();
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

main().catch(error => {
  logger.fatal({ error }, 'Failed to start server');
  process.exit(1);
});
