import express, { Express, Request, Response, NextFunction } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import compression from 'compression';
import { ApiResponse } from '@activity-relay/shared-types';
import { config } from './config';
import { logger } from './utils/logger';
import { requestIdMiddleware, notFoundHandler, errorHandler } from './middleware';
import type { Runtime } from './runtime';

// Import routes
import { createHealthRouter } from './routes/health.routes';
import { createDevicesRouter } from './modules/devices';
import { createWebhooksRouter } from './modules/webhooks';

export function createApp(runtime: Runtime): Express {
  const app: Express = express();

  // ===========================================
  // Middleware
  // ===========================================

  // Security headers
  app.use(helmet());

  // Mobile clients send no Origin; browsers are not expected
  app.use(cors({
    origin: config.nodeEnv === 'production' ? false : '*',
  }));

  // Parse JSON bodies
  app.use(express.json({ limit: '100kb' }));

  // Compress responses
  app.use(compression());

  // Correlate logs and error reports
  app.use(requestIdMiddleware);

  // Request logging
  app.use((req: Request, res: Response, next: NextFunction) => {
    const start = Date.now();

    res.on('finish', () => {
      const duration = Date.now() - start;
      logger.info(`${req.method} ${req.path} ${res.statusCode} - ${duration}ms`);
    });

    next();
  });

  // ===========================================
  // Routes
  // ===========================================

  // Health check
  const healthRoutes = createHealthRouter(runtime);
  app.use('/health', healthRoutes);
  app.use('/api/v1/health', healthRoutes);

  // API v1 routes
  app.use('/api/v1/devices', createDevicesRouter(runtime));
  app.use('/api/v1/webhooks', createWebhooksRouter(runtime));

  // Root endpoint
  app.get('/', (req: Request, res: Response) => {
    const response: ApiResponse<{ message: string; version: string }> = {
      success: true,
      data: {
        message: 'Activity Relay API',
        version: config.version,
      },
      meta: {
        timestamp: new Date().toISOString(),
        requestId: req.id,
      },
    };
    res.json(response);
  });

  // ===========================================
  // Error Handling
  // ===========================================

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
