// =====================================================
// Error Handling Middleware
// =====================================================
// Renders every failure in the ApiResponse envelope.
// Operational AppErrors keep their status and code; anything
// else is a 500 reported to Sentry.

import { Request, Response, NextFunction } from 'express';
import * as Sentry from '@sentry/node';
import { ApiResponse, ERROR_CODES } from '@activity-relay/shared-types';
import { config } from '../config';
import { AppError } from '../utils/errors';
import { logger } from '../utils/logger';

/**
 * 404 handler for unmatched routes.
 */
export function notFoundHandler(req: Request, res: Response): void {
  const response: ApiResponse = {
    success: false,
    error: {
      code: ERROR_CODES.NOT_FOUND,
      message: 'The requested resource was not found',
    },
    meta: {
      timestamp: new Date().toISOString(),
      requestId: req.id,
    },
  };
  res.status(404).json(response);
}

/**
 * Global error handler. Must be registered last.
 */
export function errorHandler(err: Error, req: Request, res: Response, _next: NextFunction): void {
  const isAppError = err instanceof AppError;
  const statusCode = isAppError ? err.statusCode : 500;
  const errorCode = isAppError ? err.code : ERROR_CODES.INTERNAL_ERROR;

  if (!isAppError || !err.isOperational) {
    logger.error('Unhandled error:', err);
    Sentry.captureException(err);
  } else if (statusCode >= 500) {
    logger.error(`[${req.method} ${req.path}] ${err.message}`);
  }

  const hideMessage = config.nodeEnv === 'production' && statusCode >= 500;

  const response: ApiResponse = {
    success: false,
    error: {
      code: errorCode,
      message: hideMessage ? 'An unexpected error occurred' : err.message,
      details: config.nodeEnv === 'development' ? err.stack : undefined,
    },
    meta: {
      timestamp: new Date().toISOString(),
      requestId: req.id,
    },
  };

  res.status(statusCode).json(response);
}
