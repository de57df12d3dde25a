// =====================================================
// API Helper for Tests
// =====================================================
// Provides utilities for testing Express endpoints.
// Handles auth and request building.

import { Express } from 'express';
import request, { Test } from 'supertest';
import jwt from 'jsonwebtoken';
import { config } from '../../src/config';

/**
 * Generate a JWT access token for testing authenticated endpoints.
 * Mimics the production token structure: the user id is the subject.
 */
export function generateTestToken(userId: string, options?: { expiresIn?: jwt.SignOptions['expiresIn'] }): string {
  return jwt.sign({}, config.jwt.accessSecret, {
    subject: userId,
    expiresIn: options?.expiresIn ?? '1h',
  });
}

/**
 * Token carrying the user id in a `userId` claim instead of `sub`.
 */
export function generateLegacyTestToken(userId: string): string {
  return jwt.sign({ userId }, config.jwt.accessSecret, { expiresIn: '1h' });
}

/**
 * Create an expired test token (for testing token expiration).
 */
export function generateExpiredTestToken(userId: string): string {
  return jwt.sign({}, config.jwt.accessSecret, {
    subject: userId,
    expiresIn: '-1h', // Expired 1 hour ago
  });
}

/**
 * Create a malformed token (for testing invalid token handling).
 */
export function generateMalformedTestToken(): string {
  return 'eyJhbGciOiJIUzI1NiIsInR5cCI6IkpXVCJ9.INVALID.SIGNATURE';
}

/**
 * Make authenticated GET request.
 */
export function authenticatedGet(app: Express, path: string, token: string): Test {
  return request(app).get(path).set('Authorization', `Bearer ${token}`).set('Accept', 'application/json');
}

/**
 * Make authenticated POST request.
 */
export function authenticatedPost(app: Express, path: string, token: string, body?: object): Test {
  const req = request(app).post(path).set('Authorization', `Bearer ${token}`).set('Accept', 'application/json');
  if (body) {
    return req.send(body);
  }
  return req;
}
