// =====================================================
// Custom Error Classes
// =====================================================

import { ErrorCode, ERROR_CODES } from '@activity-relay/shared-types';

export class AppError extends Error {
  public readonly statusCode: number;
  public readonly code: ErrorCode;
  public readonly isOperational: boolean;

  constructor(
    message: string,
    statusCode: number = 500,
    code: ErrorCode = ERROR_CODES.INTERNAL_ERROR,
    isOperational: boolean = true
  ) {
    super(message);
    this.statusCode = statusCode;
    this.code = code;
    this.isOperational = isOperational;

    Error.captureStackTrace(this, this.constructor);
  }
}

export class UnauthorizedError extends AppError {
  constructor(message: string = 'Unauthorized', code: ErrorCode = ERROR_CODES.TOKEN_INVALID) {
    super(message, 401, code);
  }
}

export class ForbiddenError extends AppError {
  constructor(message: string = 'Forbidden', code: ErrorCode = ERROR_CODES.FORBIDDEN) {
    super(message, 403, code);
  }
}

export class NotFoundError extends AppError {
  constructor(message: string, code: ErrorCode = ERROR_CODES.NOT_FOUND) {
    super(message, 404, code);
  }
}

/**
 * Missing or malformed startup configuration (signing key, identifiers).
 * Not operational: the process must not start dispatching.
 */
export class ConfigurationError extends AppError {
  public readonly fields: string[];

  constructor(message: string, fields: string[] = []) {
    super(message, 500, ERROR_CODES.CONFIGURATION_ERROR, false);
    this.fields = fields;
    this.name = 'ConfigurationError';
  }
}

/**
 * External calendar/mail feed unreachable or unauthenticated.
 */
export class FeedUnavailableError extends AppError {
  public readonly provider: string;
  public readonly retryable: boolean;
  public readonly originalError?: Error;

  constructor(provider: string, reason: string, retryable: boolean = true, originalError?: Error) {
    super(`Feed provider ${provider} is unavailable: ${reason}`, 503, ERROR_CODES.FEED_UNAVAILABLE);
    this.provider = provider;
    this.retryable = retryable;
    this.originalError = originalError;
    this.name = 'FeedUnavailableError';
  }
}
