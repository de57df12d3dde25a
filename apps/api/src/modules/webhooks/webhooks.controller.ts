// =====================================================
// Webhooks Controller
// =====================================================
// Google Calendar push notifications. Google authenticates
// itself by the channel id it was handed when the channel was
// registered, so these routes carry no bearer token; unknown
// channels are acknowledged and ignored.

import { Router, Request, Response, NextFunction } from 'express';
import { ApiResponse } from '@activity-relay/shared-types';
import { logger } from '../../utils/logger';
import type { Runtime } from '../../runtime';

interface WebhookAck {
  status: 'ok' | 'ignored';
  message: string;
}

function headerValue(value: string | string[] | undefined): string | undefined {
  return Array.isArray(value) ? value[0] : value;
}

export function createWebhooksRouter(runtime: Runtime): Router {
  const router: Router = Router();

  // =====================================================
  // POST /webhooks/google/calendar
  // =====================================================

  router.post(
    '/google/calendar',
    async (req: Request, res: Response, next: NextFunction): Promise<void> => {
      try {
        const channelId = headerValue(req.headers['x-goog-channel-id']);
        const resourceState = headerValue(req.headers['x-goog-resource-state']);

        logger.info('[Webhooks] Calendar notification', {
          channelId,
          resourceState,
          resourceId: headerValue(req.headers['x-goog-resource-id']),
        });

        const outcome = await runtime.feedRefresher.handleChannelNotification(channelId, resourceState);

        const response: ApiResponse<WebhookAck> = {
          success: true,
          data: {
            status: outcome === 'ignored' ? 'ignored' : 'ok',
            message: outcome === 'ignored' ? 'unknown_channel' : outcome,
          },
          meta: {
            timestamp: new Date().toISOString(),
            requestId: req.id,
          },
        };

        res.status(200).json(response);
      } catch (error) {
        next(error);
      }
    },
  );

  return router;
}
