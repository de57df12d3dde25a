// =====================================================
// APNs Types
// =====================================================

import type { ContentState, ContentStateInput, LiveActivityEvent } from '@activity-relay/shared-types';

export type ApnsEnvironment = 'development' | 'production';

export const APNS_HOSTS: Record<ApnsEnvironment, string> = {
  development: 'https://api.sandbox.push.apple.com',
  production: 'https://api.push.apple.com',
};

/**
 * Validated signing material and routing identifiers.
 */
export interface ApnsCredentials {
  keyId: string;
  teamId: string;
  bundleId: string;
  /** PEM-encoded PKCS#8 EC private key (.p8 contents) */
  privateKey: string;
  environment: ApnsEnvironment;
}

/**
 * Bearer token presented to the gateway.
 * Times are milliseconds since the epoch.
 */
export interface AuthToken {
  token: string;
  issuedAt: number;
  expiresAt: number;
}

/**
 * Anything that can hand out a currently valid gateway token.
 */
export interface TokenSource {
  getValidToken(): AuthToken;
  invalidate(): void;
}

/**
 * Body of a live activity push.
 */
export interface LiveActivityPayload {
  aps: {
    timestamp: number;
    event: LiveActivityEvent;
    'content-state': ContentState | ContentStateInput;
  };
}

// =====================================================
// Transport
// =====================================================

export interface PushRequest {
  path: string;
  headers: Record<string, string>;
  body: string;
}

export interface PushResponse {
  status: number;
  body: string;
  headers: Record<string, string | undefined>;
}

/**
 * Low-level connection to the gateway. Rejects only on
 * connection-level failures; any HTTP status resolves.
 */
export interface PushTransport {
  post(request: PushRequest): Promise<PushResponse>;
  close(): Promise<void>;
}

// =====================================================
// Dispatch Results
// =====================================================

interface DispatchResultBase {
  deviceToken: string;
  activityId: string;
  /** HTTP status, null when no response was received */
  statusCode: number | null;
  /** APNs `reason` string from the error body */
  reason?: string;
}

export interface DeliveredResult extends DispatchResultBase {
  outcome: 'DELIVERED';
  apnsId?: string;
}

export interface PermanentFailureResult extends DispatchResultBase {
  outcome: 'PERMANENT_FAILURE';
  /** The destination token is dead and its registration should be removed */
  evict: boolean;
}

export interface TransientFailureResult extends DispatchResultBase {
  outcome: 'TRANSIENT_FAILURE';
  retryAfterSeconds?: number;
}

export type DispatchResult = DeliveredResult | PermanentFailureResult | TransientFailureResult;
