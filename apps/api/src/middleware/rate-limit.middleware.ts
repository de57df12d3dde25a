// =====================================================
// Rate Limiting Middleware
// =====================================================
// Protects device mutation endpoints from flooding.
// Counters live in express-rate-limit's in-memory store, which
// matches the single-process deployment of this service.

import rateLimit, { RateLimitRequestHandler } from 'express-rate-limit';
import { ApiResponse, ERROR_CODES } from '@activity-relay/shared-types';
import { config } from '../config';

// ===========================================
// Types
// ===========================================

export interface RateLimitConfig {
  windowMs: number;
  max: number;
  message?: string;
  skipSuccessfulRequests?: boolean;
}

// ===========================================
// Rate Limiters
// ===========================================

/**
 * Configurable rate limiter factory.
 * Requests are counted per authenticated user, or per IP before authentication.
 * Each call creates an independent counter store.
 *
 * @example
 * ```typescript
 * const limiter = createRateLimiter({ windowMs: 60 * 1000, max: 20 });
 * router.post('/custom', requireAuth, limiter, handler);
 * ```
 */
export function createRateLimiter(options: RateLimitConfig): RateLimitRequestHandler {
  const {
    windowMs,
    max,
    message = 'Too many requests. Please try again later.',
    skipSuccessfulRequests = false,
  } = options;

  return rateLimit({
    windowMs,
    max,
    standardHeaders: true,
    legacyHeaders: false,
    skipSuccessfulRequests,
    keyGenerator: (req) => (req.user ? `user:${req.user.id}` : `ip:${req.ip ?? 'unknown'}`),
    handler: (req, res) => {
      const response: ApiResponse = {
        success: false,
        error: {
          code: ERROR_CODES.RATE_LIMITED,
          message,
        },
        meta: {
          timestamp: new Date().toISOString(),
          requestId: req.id,
        },
      };
      res.status(429).json(response);
    },
  });
}

/**
 * Device register/unregister/update/sync limiter.
 * 1 minute window, 10 requests max per user.
 */
export function createDeviceRateLimiter(): RateLimitRequestHandler {
  return createRateLimiter({
    windowMs: config.rateLimit.windowMs,
    max: config.rateLimit.max,
    message: 'Too many requests. Please slow down.',
  });
}
