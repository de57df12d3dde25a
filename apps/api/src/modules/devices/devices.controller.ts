// =====================================================
// Devices Controller
// =====================================================
// HTTP layer for live activity registrations.
// All endpoints require authentication; mutations are rate
// limited. A device can only be changed by the user who
// registered it.

import { Router, Request, Response, NextFunction } from 'express';
import {
  ApiResponse,
  ERROR_CODES,
  DeviceListItem,
  DeviceListResponse,
  RegisterDeviceResponse,
} from '@activity-relay/shared-types';
import { z } from 'zod';
import {
  registerDeviceSchema,
  unregisterDeviceSchema,
  updateLiveActivitySchema,
  syncStateSchema,
  validateInput,
} from './devices.schemas';
import { requireAuth, getAuthenticatedUser, createDeviceRateLimiter } from '../../middleware';
import { ForbiddenError, NotFoundError } from '../../utils/errors';
import { logger, maskToken } from '../../utils/logger';
import type { Runtime } from '../../runtime';
import type { DeviceRegistration, DeviceRegistry } from '../../services/registry/device-registry';
import { slotForRotation } from '../../services/dispatch';

// =====================================================
// Helper Functions
// =====================================================

function formatValidationErrors(errors: { path: (string | number)[]; message: string }[]): string {
  return errors.map((e) => `${e.path.join('.')}: ${e.message}`).join('; ');
}

function sendValidationError(req: Request, res: Response, errors: z.ZodError['errors'] | undefined): void {
  res.status(400).json({
    success: false,
    error: {
      code: ERROR_CODES.VALIDATION_ERROR,
      message: formatValidationErrors(errors ?? []),
    },
    meta: {
      timestamp: new Date().toISOString(),
      requestId: req.id,
    },
  });
}

function sendSuccess<T>(req: Request, res: Response, data: T, status: number = 200): void {
  const response: ApiResponse<T> = {
    success: true,
    data,
    meta: {
      timestamp: new Date().toISOString(),
      requestId: req.id,
    },
  };
  res.status(status).json(response);
}

/**
 * Look up a device the caller is allowed to change.
 *
 * @throws {NotFoundError} when the device is not registered
 * @throws {ForbiddenError} when another user registered it
 */
function requireOwnedDevice(registry: DeviceRegistry, deviceToken: string, userId: string): DeviceRegistration {
  const registration = registry.get(deviceToken);

  if (!registration) {
    throw new NotFoundError('Device not registered', ERROR_CODES.DEVICE_NOT_FOUND);
  }
  assertOwner(registration, userId);

  return registration;
}

function assertOwner(registration: DeviceRegistration, userId: string): void {
  if (registration.userId !== null && registration.userId !== userId) {
    throw new ForbiddenError('Device belongs to another user', ERROR_CODES.DEVICE_NOT_OWNED);
  }
}

function toListItem(registration: DeviceRegistration): DeviceListItem {
  const { synced } = registration;

  return {
    deviceToken: maskToken(registration.deviceToken),
    activityId: registration.activityId,
    userId: registration.userId,
    rotationIndex: registration.rotationIndex,
    currentSlot: slotForRotation(registration.rotationIndex),
    registeredAt: registration.registeredAt.toISOString(),
    lastUpdateAt: registration.lastUpdateAt ? registration.lastUpdateAt.toISOString() : null,
    hasCalendarData: (synced.calendarEvents?.length ?? 0) > 0,
    hasEmailData: synced.emailSummary !== undefined,
  };
}

// =====================================================
// Router
// =====================================================

export function createDevicesRouter(runtime: Runtime): Router {
  const router: Router = Router();
  const { registry, scheduler, feedRefresher } = runtime;
  const rateLimiter = createDeviceRateLimiter();

  // =====================================================
  // POST /devices/register
  // =====================================================
  // Idempotent upsert. Restarts the device's rotation and, when
  // Google credentials are supplied, starts monitoring the user's
  // calendar and inbox in the background.

  router.post(
    '/register',
    requireAuth,
    rateLimiter,
    async (req: Request, res: Response, next: NextFunction): Promise<void> => {
      try {
        const user = getAuthenticatedUser(req);

        const validation = validateInput(registerDeviceSchema, req.body);
        if (!validation.success || !validation.data) {
          sendValidationError(req, res, validation.errors);
          return;
        }

        const { deviceToken, activityId, liveActivityPushToken, googleCredentials } = validation.data;

        const existing = registry.get(deviceToken);
        if (existing) {
          assertOwner(existing, user.id);
        }

        await registry.register({
          deviceToken,
          activityId,
          userId: user.id,
          liveActivityPushToken,
          googleCredentials,
        });

        if (googleCredentials) {
          // The first fetch and channel setup finish after the response
          feedRefresher
            .monitor(user.id, googleCredentials, runtime.webhookUrl || undefined)
            .catch((error: unknown) => {
              logger.error('[Devices] Feed monitoring failed to start', { userId: user.id, error });
            });
        }

        logger.info('[Devices] Device registered', {
          device: maskToken(deviceToken),
          userId: user.id,
          monitoring: Boolean(googleCredentials),
        });

        sendSuccess<RegisterDeviceResponse>(req, res, {
          message: `Device registered for user ${user.id}`,
          monitoringEnabled: Boolean(googleCredentials) && feedRefresher.isEnabled,
          deviceCount: registry.size,
        });
      } catch (error) {
        next(error);
      }
    },
  );

  // =====================================================
  // POST /devices/unregister
  // =====================================================
  // Idempotent: unregistering an unknown device succeeds.

  router.post(
    '/unregister',
    requireAuth,
    rateLimiter,
    async (req: Request, res: Response, next: NextFunction): Promise<void> => {
      try {
        const user = getAuthenticatedUser(req);

        const validation = validateInput(unregisterDeviceSchema, req.body);
        if (!validation.success || !validation.data) {
          sendValidationError(req, res, validation.errors);
          return;
        }

        const { deviceToken } = validation.data;
        const existing = registry.get(deviceToken);
        if (existing) {
          assertOwner(existing, user.id);
        }

        const removed = await registry.unregister(deviceToken);

        logger.info('[Devices] Device unregistered', { device: maskToken(deviceToken), removed });

        sendSuccess(req, res, { message: 'Device unregistered', removed });
      } catch (error) {
        next(error);
      }
    },
  );

  // =====================================================
  // GET /devices
  // =====================================================
  // The caller's registrations, tokens truncated.

  router.get('/', requireAuth, (req: Request, res: Response, next: NextFunction): void => {
    try {
      const user = getAuthenticatedUser(req);
      const devices = registry.listByUser(user.id).map(toListItem);

      sendSuccess<DeviceListResponse>(req, res, { count: devices.length, devices });
    } catch (error) {
      next(error);
    }
  });

  // =====================================================
  // POST /devices/update
  // =====================================================
  // Immediate out-of-cycle push with caller-supplied content.

  router.post(
    '/update',
    requireAuth,
    rateLimiter,
    async (req: Request, res: Response, next: NextFunction): Promise<void> => {
      try {
        const user = getAuthenticatedUser(req);

        const validation = validateInput(updateLiveActivitySchema, req.body);
        if (!validation.success || !validation.data) {
          sendValidationError(req, res, validation.errors);
          return;
        }

        const { deviceToken, activityId, contentState } = validation.data;
        requireOwnedDevice(registry, deviceToken, user.id);

        const result = await scheduler.dispatchUpdate(deviceToken, activityId, contentState);

        if (result.outcome !== 'DELIVERED') {
          const response: ApiResponse = {
            success: false,
            error: {
              code: ERROR_CODES.PUSH_DELIVERY_FAILED,
              message: `Push delivery failed: ${result.reason ?? 'unknown reason'}`,
              details: { outcome: result.outcome, statusCode: result.statusCode },
            },
            meta: {
              timestamp: new Date().toISOString(),
              requestId: req.id,
            },
          };
          res.status(502).json(response);
          return;
        }

        sendSuccess(req, res, { message: 'Live activity updated', apnsId: result.apnsId ?? null });
      } catch (error) {
        next(error);
      }
    },
  );

  // =====================================================
  // POST /devices/sync-state
  // =====================================================
  // Client uploads calendar, mail and weather before going to
  // the background. Synced data takes precedence over the feed.

  router.post(
    '/sync-state',
    requireAuth,
    rateLimiter,
    async (req: Request, res: Response, next: NextFunction): Promise<void> => {
      try {
        const user = getAuthenticatedUser(req);

        const validation = validateInput(syncStateSchema, req.body);
        if (!validation.success || !validation.data) {
          sendValidationError(req, res, validation.errors);
          return;
        }

        const { deviceToken, ...state } = validation.data;
        requireOwnedDevice(registry, deviceToken, user.id);

        const updated = await registry.syncState(deviceToken, state);

        logger.debug('[Devices] State synced', {
          device: maskToken(deviceToken),
          events: state.calendarEvents?.length ?? 0,
          hasWeather: state.weather !== undefined,
        });

        sendSuccess(req, res, {
          message: 'State synced',
          syncedAt: updated.synced.syncedAt ? updated.synced.syncedAt.toISOString() : null,
        });
      } catch (error) {
        next(error);
      }
    },
  );

  return router;
}
