import 'dotenv/config';
import http from 'http';
import { createApp } from './app.js';
import { connectDatabase, disconnectDatabase } from './config/database.js';
import { logger } from './config/logger.js';
import { LoaderConfig } from './config/constants.js';
import { CatalogLoader, MongoCatalogStore } from './modules/catalog/index.js';

// Server configuration
const PORT = parseInt(process.env['PORT'] ?? '3000', 10);
const HOST = process.env['HOST'] ?? '127.0.0.1';

const store = new MongoCatalogStore();
const server = http.createServer(createApp({ loader: new CatalogLoader(store), reader: store }));

let shuttingDown = false;

// Graceful shutdown handler
const gracefulShutdown = (signal: string): void => {
  if (shuttingDown) {
    return;
  }
  shuttingDown = true;
  logger.info(`${signal} received. Starting graceful shutdown...`);

  // Stop accepting new connections
  server.close(() => {
    logger.info('HTTP server closed');

    disconnectDatabase()
      .then(() => {
        logger.info('Graceful shutdown completed');
        process.exit(0);
      })
      .catch((error: unknown) => {
        logger.error('Error during graceful shutdown:', {
          error: error instanceof Error ? error.message : String(error),
        });
        process.exit(1);
      });
  });

  // Force shutdown once in-flight loads have had their full timeout
  setTimeout(() => {
    logger.error('Forced shutdown due to timeout');
    process.exit(1);
  }, LoaderConfig.DEFAULT_TIMEOUT_MS + 5000).unref();
};

// Register shutdown handlers
process.on('SIGTERM', () => gracefulShutdown('SIGTERM'));
process.on('SIGINT', () => gracefulShutdown('SIGINT'));

// Handle unhandled promise rejections
process.on('unhandledRejection', (reason: unknown) => {
  logger.error('Unhandled Rejection:', {
    reason: reason instanceof Error ? reason.message : String(reason),
  });
  gracefulShutdown('unhandledRejection');
});

// Start server
const startServer = async (): Promise<void> => {
  await connectDatabase();
  await store.prepare();

  server.listen(PORT, HOST, () => {
    logger.info('='.repeat(60));
    logger.info('Catalog Loader Started');
    logger.info('='.repeat(60));
    logger.info(`Host: ${HOST}`);
    logger.info(`Port: ${PORT}`);
    logger.info(`Environment: ${process.env['NODE_ENV'] ?? 'development'}`);
    logger.info(`Node: ${process.version}`);
    logger.info(`Load timeout: ${LoaderConfig.DEFAULT_TIMEOUT_MS}ms, max batch: ${LoaderConfig.MAX_BATCH_SIZE} records`);
    logger.info('-'.repeat(60));
    logger.info(`Health: http://${HOST}:${PORT}/health`);
    logger.info(`API: http://${HOST}:${PORT}/api/v1/catalog`);
    logger.info('='.repeat(60));
  });
};

startServer().catch((error: unknown) => {
  logger.error('Failed to start server:', {
    error: error instanceof Error ? error.message : String(error),
  });
  process.exit(1);
});
