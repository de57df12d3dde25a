// =====================================================
// Authentication Middleware
// =====================================================
// Protects device routes by validating bearer JWTs issued by
// the companion auth service (HS256, shared secret).
// Attaches the authenticated user to the request object.

import { Request, Response, NextFunction } from 'express';
import jwt from 'jsonwebtoken';
import { ERROR_CODES } from '@activity-relay/shared-types';
import { config } from '../config';
import { UnauthorizedError } from '../utils/errors';

// ===========================================
// Types
// ===========================================

export interface AuthenticatedUser {
  id: string;
}

declare global {
  namespace Express {
    interface Request {
      user?: AuthenticatedUser;
    }
  }
}

// ===========================================
// Token Verification
// ===========================================

/**
 * Verify an access token and resolve the user it was issued to.
 * The user id is read from `sub`, falling back to a `userId` claim.
 */
export function verifyAccessToken(token: string, secret: string = config.jwt.accessSecret): AuthenticatedUser {
  let payload: string | jwt.JwtPayload;
  try {
    payload = jwt.verify(token, secret, { algorithms: ['HS256'] });
  } catch (error) {
    if (error instanceof jwt.TokenExpiredError) {
      throw new UnauthorizedError('Access token expired', ERROR_CODES.TOKEN_EXPIRED);
    }
    throw new UnauthorizedError('Invalid access token', ERROR_CODES.TOKEN_INVALID);
  }

  if (typeof payload === 'string') {
    throw new UnauthorizedError('Invalid token payload', ERROR_CODES.TOKEN_INVALID);
  }

  const userId: unknown = payload.sub ?? payload.userId;
  if (typeof userId !== 'string' || userId.length === 0) {
    throw new UnauthorizedError('Token has no user id', ERROR_CODES.TOKEN_INVALID);
  }

  return { id: userId };
}

// ===========================================
// Middleware Functions
// ===========================================

/**
 * Extracts Bearer token from Authorization header.
 */
function extractBearerToken(authHeader: string | undefined): string | null {
  if (!authHeader) {
    return null;
  }

  const parts = authHeader.split(' ');

  if (parts.length !== 2 || parts[0].toLowerCase() !== 'bearer') {
    return null;
  }

  return parts[1];
}

/**
 * Required authentication middleware.
 * Returns 401 if no valid token is provided.
 */
export function requireAuth(req: Request, _res: Response, next: NextFunction): void {
  try {
    const token = extractBearerToken(req.headers.authorization);

    if (!token) {
      throw new UnauthorizedError('Authentication required', ERROR_CODES.TOKEN_INVALID);
    }

    req.user = verifyAccessToken(token);
    next();
  } catch (error) {
    next(error);
  }
}

/**
 * Gets the authenticated user from request.
 * Use after requireAuth middleware.
 */
export function getAuthenticatedUser(req: Request): AuthenticatedUser {
  if (!req.user) {
    throw new UnauthorizedError('User not authenticated', ERROR_CODES.TOKEN_INVALID);
  }

  return req.user;
}
