// =====================================================
// APNs - Barrel Export
// =====================================================

export * from './types';
export { loadApnsCredentials, assertSigningKey } from './apns.config';
export type { ApnsConfigSource } from './apns.config';
export { ApnsTokenProvider, TOKEN_LIFETIME_MS } from './apns-token.provider';
export { ApnsClient, parseReason } from './apns.client';
export type { ApnsClientOptions } from './apns.client';
export { Http2PushTransport } from './apns.transport';
export { buildLiveActivityPayload } from './payload';
