// =====================================================
// APNs Gateway Client
// =====================================================
// Sends one live activity push per call and maps the gateway
// response onto a DispatchResult. HTTP-level failures never
// throw: the scheduler decides what to do with each outcome.

import { logger, maskToken } from '../../utils/logger';
import type {
  AuthToken,
  DispatchResult,
  LiveActivityPayload,
  PushResponse,
  PushTransport,
  TokenSource,
} from './types';

// Reasons that blame our provider token rather than the device
const PROVIDER_TOKEN_REASONS = new Set(['ExpiredProviderToken', 'InvalidProviderToken', 'MissingProviderToken']);

// 400 reasons that mean the destination token itself is unusable
const DEAD_TOKEN_REASONS = new Set(['BadDeviceToken', 'DeviceTokenNotForTopic']);

export interface ApnsClientOptions {
  bundleId: string;
  /** Invalidated when the gateway rejects the provider token */
  tokenSource?: TokenSource;
}

export class ApnsClient {
  private readonly topic: string;

  constructor(
    private readonly transport: PushTransport,
    private readonly options: ApnsClientOptions,
  ) {
    this.topic = `${options.bundleId}.push-type.liveactivity`;
  }

  async send(
    deviceToken: string,
    activityId: string,
    payload: LiveActivityPayload,
    token: AuthToken,
  ): Promise<DispatchResult> {
    let response: PushResponse;

    try {
      response = await this.transport.post({
        path: `/3/device/${deviceToken}`,
        headers: {
          authorization: `bearer ${token.token}`,
          'apns-push-type': 'liveactivity',
          'apns-topic': this.topic,
          'apns-priority': '10',
        },
        body: JSON.stringify(payload),
      });
    } catch (error) {
      logger.warn('[ApnsClient] Request failed before a response', {
        device: maskToken(deviceToken),
        error,
      });
      return { outcome: 'TRANSIENT_FAILURE', deviceToken, activityId, statusCode: null, reason: 'NetworkError' };
    }

    return this.interpret(deviceToken, activityId, response);
  }

  private interpret(deviceToken: string, activityId: string, response: PushResponse): DispatchResult {
    const { status } = response;
    const reason = parseReason(response.body);
    const base = { deviceToken, activityId, statusCode: status, reason };

    if (status >= 200 && status < 300) {
      return { ...base, outcome: 'DELIVERED', apnsId: response.headers['apns-id'] };
    }

    if (status === 429) {
      const retryAfter = parseInt(response.headers['retry-after'] ?? '', 10);
      return {
        ...base,
        outcome: 'TRANSIENT_FAILURE',
        retryAfterSeconds: Number.isNaN(retryAfter) ? undefined : retryAfter,
      };
    }

    if (status >= 500) {
      return { ...base, outcome: 'TRANSIENT_FAILURE' };
    }

    if (status === 403 && reason && PROVIDER_TOKEN_REASONS.has(reason)) {
      logger.warn('[ApnsClient] Provider token rejected, re-signing on next send', { reason });
      this.options.tokenSource?.invalidate();
      return { ...base, outcome: 'TRANSIENT_FAILURE' };
    }

    if (status === 403 || status === 410) {
      return { ...base, outcome: 'PERMANENT_FAILURE', evict: true };
    }

    if (status === 400) {
      const evict = reason !== undefined && DEAD_TOKEN_REASONS.has(reason);
      if (!evict) {
        logger.error('[ApnsClient] Gateway rejected payload as malformed', {
          device: maskToken(deviceToken),
          reason,
        });
      }
      return { ...base, outcome: 'PERMANENT_FAILURE', evict };
    }

    return { ...base, outcome: 'PERMANENT_FAILURE', evict: false };
  }
}

/**
 * Extract the `reason` field from an APNs error body.
 */
export function parseReason(body: string): string | undefined {
  if (!body) return undefined;

  try {
    const parsed: unknown = JSON.parse(body);
    if (typeof parsed === 'object' && parsed !== null && 'reason' in parsed) {
      const { reason } = parsed;
      return typeof reason === 'string' ? reason : undefined;
    }
  } catch {
    // Non-JSON bodies carry no reason
  }

  return undefined;
}
