import express from 'express';
import type { Express, Request, Response, NextFunction } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import { HttpStatus } from './config/constants.js';
import { logger } from './config/logger.js';
import { getDatabaseStatus } from './config/database.js';
import { createCatalogRoutes } from './modules/catalog/catalog.routes.js';
import { CatalogService } from './modules/catalog/catalog.service.js';
import type { CatalogLoaderApi } from './modules/catalog/catalog.loader.js';
import type { CatalogReader } from './modules/catalog/catalog.store.js';
import { globalErrorHandler, notFoundHandler } from './shared/middleware/error.middleware.js';
import { requestId } from './shared/middleware/request-id.middleware.js';

const API_VERSION = '/api/v1';

// Batches can be large; the record count is capped separately by CATALOG_MAX_BATCH_SIZE
const JSON_BODY_LIMIT = process.env['JSON_BODY_LIMIT'] ?? '10mb';

export interface AppDependencies {
  loader: CatalogLoaderApi;
  /** Backs the read endpoints */
  reader: CatalogReader;
  /** Reports database connectivity for /health */
  databaseStatus?: () => { isConnected: boolean; readyStateText: string };
}

/**
 * Build the Express app around a catalog loader and reader.
 */
export const createApp = ({ loader, reader, databaseStatus = getDatabaseStatus }: AppDependencies): Express => {
  const app: Express = express();

  // Trust proxy (for client IPs behind a reverse proxy)
  app.set('trust proxy', 1);

  app.use(cors());
  app.use(helmet());

  // Body parsing middleware
  app.use(express.json({ limit: JSON_BODY_LIMIT }));

  app.use(requestId);

  // Request logging
  app.use((req: Request, _res: Response, next: NextFunction) => {
    logger.http(`${req.method} ${req.path}`, {
      requestId: req.requestId,
      ip: req.ip,
      userAgent: req.get('user-agent'),
    });
    next();
  });

  app.get('/health', (_req: Request, res: Response) => {
    const dbStatus = databaseStatus();

    const healthStatus = {
      status: dbStatus.isConnected ? 'healthy' : 'degraded',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      environment: process.env['NODE_ENV'] ?? 'development',
      database: {
        status: dbStatus.readyStateText,
        connected: dbStatus.isConnected,
      },
    };

    const statusCode = dbStatus.isConnected ? HttpStatus.OK : HttpStatus.SERVICE_UNAVAILABLE;
    res.status(statusCode).json(healthStatus);
  });

  app.use(`${API_VERSION}/catalog`, createCatalogRoutes(loader, new CatalogService(reader)));

  // 404 handler
  app.use(notFoundHandler);

  // Global error handler
  app.use(globalErrorHandler);

  return app;
};

export default createApp;
