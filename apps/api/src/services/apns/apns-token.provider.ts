// =====================================================
// APNs Provider Token
// =====================================================
// Signs the ES256 bearer JWT that authenticates this server
// to the gateway. One token is cached process-wide and reused
// until it expires; the gateway rejects tokens older than an
// hour and throttles providers that re-sign too often.

import jwt from 'jsonwebtoken';
import { systemClock, type Clock } from '../../lib/clock';
import { logger } from '../../utils/logger';
import { ConfigurationError } from '../../utils/errors';
import { assertSigningKey } from './apns.config';
import type { ApnsCredentials, AuthToken, TokenSource } from './types';

export const TOKEN_LIFETIME_MS = 60 * 60 * 1000;

export class ApnsTokenProvider implements TokenSource {
  private cached: AuthToken | null = null;

  constructor(
    private readonly credentials: ApnsCredentials,
    private readonly clock: Clock = systemClock,
  ) {
    assertSigningKey(credentials.privateKey);
  }

  /**
   * Return the cached token while it is still valid, otherwise sign a new one.
   * Re-entrant calls at the same instant may both sign; either token is valid.
   */
  getValidToken(): AuthToken {
    const now = this.clock.now();

    if (this.cached && now < this.cached.expiresAt) {
      return this.cached;
    }

    this.cached = this.sign(now);
    logger.debug('[ApnsToken] Signed new provider token', {
      keyId: this.credentials.keyId,
      expiresAt: new Date(this.cached.expiresAt).toISOString(),
    });

    return this.cached;
  }

  /**
   * Drop the cached token so the next call re-signs.
   * Used when the gateway reports the provider token as expired or invalid.
   */
  invalidate(): void {
    this.cached = null;
  }

  private sign(now: number): AuthToken {
    let token: string;

    try {
      token = jwt.sign(
        { iss: this.credentials.teamId, iat: Math.floor(now / 1000) },
        this.credentials.privateKey,
        { algorithm: 'ES256', keyid: this.credentials.keyId },
      );
    } catch (error) {
      throw new ConfigurationError(
        `APNs signing key rejected by signer: ${error instanceof Error ? error.message : String(error)}`,
        ['privateKey'],
      );
    }

    return {
      token,
      issuedAt: now,
      expiresAt: now + TOKEN_LIFETIME_MS,
    };
  }
}
