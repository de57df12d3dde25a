// =====================================================
// Dispatch Scheduler
// =====================================================
// Recurring rotation loop. Every tick snapshots the registry,
// then for each device concurrently: advances its rotation,
// builds content for the new slot, and pushes it.
//
// Ticks never overlap. A tick requested while one is running
// is deferred, and any number of such requests collapse into
// a single follow-up tick.
//
// Per-device failures are caught here and never abort a tick.

import {
  CONTENT_SLOTS,
  type ContentSlot,
  type ContentState,
  type ContentStateInput,
} from '@activity-relay/shared-types';
import { logger, maskToken } from '../../utils/logger';
import { AppError, NotFoundError } from '../../utils/errors';
import {
  buildLiveActivityPayload,
  type ApnsClient,
  type DispatchResult,
  type TokenSource,
} from '../apns';
import type { ContentSource } from '../content/content.source';
import { pushTargetOf, type DeviceRegistration, type DeviceRegistry } from '../registry/device-registry';

export type SchedulerState = 'idle' | 'running-tick' | 'stopped';

export interface TickSummary {
  devices: number;
  delivered: number;
  transientFailures: number;
  permanentFailures: number;
  evicted: number;
  /** Devices removed mid-tick or whose dispatch threw */
  skipped: number;
}

export interface DispatchSchedulerOptions {
  intervalMs: number;
}

/**
 * Map a rotation cursor onto the content cycle.
 */
export function slotForRotation(rotationIndex: number): ContentSlot {
  return CONTENT_SLOTS[rotationIndex % CONTENT_SLOTS.length];
}

interface Delivery {
  result: DispatchResult;
  evicted: boolean;
}

function emptySummary(devices: number): TickSummary {
  return { devices, delivered: 0, transientFailures: 0, permanentFailures: 0, evicted: 0, skipped: 0 };
}

export class DispatchScheduler {
  private timer: NodeJS.Timeout | null = null;
  private current: Promise<TickSummary> | null = null;
  private followUp: Promise<TickSummary> | null = null;

  constructor(
    private readonly registry: DeviceRegistry,
    private readonly contentSource: ContentSource,
    private readonly client: ApnsClient,
    private readonly tokenSource: TokenSource,
    private readonly options: DispatchSchedulerOptions,
  ) {}

  get state(): SchedulerState {
    if (this.current) return 'running-tick';
    return this.timer ? 'idle' : 'stopped';
  }

  /**
   * Begin ticking every `intervalMs`. No-op when already started.
   */
  start(): void {
    if (this.timer) return;

    this.timer = setInterval(() => {
      void this.runTick();
    }, this.options.intervalMs);

    logger.info(`[Scheduler] Rotation started, interval ${this.options.intervalMs}ms`);
  }

  /**
   * Release the timer and wait for any in-flight tick to finish.
   */
  async stop(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
      logger.info('[Scheduler] Rotation stopped');
    }

    const pending = this.followUp ?? this.current;
    if (pending) {
      await pending;
    }
  }

  /**
   * Run one tick now, or defer it behind the running tick.
   * Resolves with the summary of the tick that served the request.
   */
  runTick(): Promise<TickSummary> {
    if (this.followUp) {
      return this.followUp;
    }
    if (!this.current) {
      return this.begin();
    }

    logger.debug('[Scheduler] Tick still running, deferring');
    this.followUp = this.current.then(
      () => this.begin(),
      () => this.begin(),
    );
    return this.followUp;
  }

  /**
   * Push caller-supplied content to one registered device outside the
   * rotation. The rotation cursor is left untouched.
   *
   * @throws {NotFoundError} when the device is not registered
   */
  async dispatchUpdate(
    deviceToken: string,
    activityId: string,
    contentState: ContentStateInput,
  ): Promise<DispatchResult> {
    const registration = this.registry.get(deviceToken);
    if (!registration) {
      throw new NotFoundError('Device not registered');
    }

    const { result } = await this.deliver({ ...registration, activityId }, contentState);
    return result;
  }

  /**
   * Push the current slot's content to every device of a user, e.g. after
   * their feed data changed.
   */
  async dispatchToUser(userId: string): Promise<DispatchResult[]> {
    const registrations = this.registry.listByUser(userId);
    if (registrations.length === 0) {
      logger.debug('[Scheduler] No devices for user', { userId });
      return [];
    }

    const settled = await Promise.allSettled(
      registrations.map((registration) => {
        const slot = slotForRotation(registration.rotationIndex);
        const content = this.contentSource.getContent(slot, registration.userId, registration.synced);
        return this.deliver(registration, content);
      }),
    );

    const results: DispatchResult[] = [];
    settled.forEach((outcome, i) => {
      if (outcome.status === 'fulfilled') {
        results.push(outcome.value.result);
      } else {
        this.logDispatchError(registrations[i], outcome.reason);
      }
    });
    return results;
  }

  // ===========================================
  // Private Methods
  // ===========================================

  private begin(): Promise<TickSummary> {
    this.followUp = null;

    const tick = this.tick().finally(() => {
      if (this.current === tick) {
        this.current = null;
      }
    });
    this.current = tick;
    return tick;
  }

  private async tick(): Promise<TickSummary> {
    const registrations = this.registry.list();
    const summary = emptySummary(registrations.length);

    if (registrations.length === 0) {
      return summary;
    }

    const settled = await Promise.allSettled(registrations.map((registration) => this.rotate(registration)));

    settled.forEach((outcome, i) => {
      if (outcome.status === 'rejected') {
        summary.skipped += 1;
        this.logDispatchError(registrations[i], outcome.reason);
        return;
      }

      const delivery = outcome.value;
      if (!delivery) {
        summary.skipped += 1;
        return;
      }

      if (delivery.evicted) summary.evicted += 1;
      switch (delivery.result.outcome) {
        case 'DELIVERED':
          summary.delivered += 1;
          break;
        case 'TRANSIENT_FAILURE':
          summary.transientFailures += 1;
          break;
        case 'PERMANENT_FAILURE':
          summary.permanentFailures += 1;
          break;
      }
    });

    logger.debug('[Scheduler] Tick complete', summary);
    return summary;
  }

  /**
   * Advance one device and push its next slot.
   * Resolves null when the device disappeared before or while it was rotated.
   */
  private async rotate(registration: DeviceRegistration): Promise<Delivery | null> {
    try {
      const rotationIndex = await this.registry.advanceRotation(registration.deviceToken);
      const slot = slotForRotation(rotationIndex);
      const content = this.contentSource.getContent(slot, registration.userId, registration.synced);
      return await this.deliver(registration, content);
    } catch (error) {
      if (error instanceof NotFoundError) {
        logger.debug('[Scheduler] Device unregistered mid-dispatch, skipping', {
          device: maskToken(registration.deviceToken),
        });
        return null;
      }
      throw error;
    }
  }

  private async deliver(
    registration: DeviceRegistration,
    content: ContentState | ContentStateInput,
  ): Promise<Delivery> {
    const timestamp = await this.registry.nextPushTimestamp(registration.deviceToken);
    const payload = buildLiveActivityPayload(content, timestamp);
    const token = this.tokenSource.getValidToken();

    const result = await this.client.send(pushTargetOf(registration), registration.activityId, payload, token);
    const evicted = await this.record(registration, result);
    return { result, evicted };
  }

  /**
   * Apply a dispatch outcome to the registry.
   *
   * @returns whether the registration was evicted
   */
  private async record(registration: DeviceRegistration, result: DispatchResult): Promise<boolean> {
    const device = maskToken(registration.deviceToken);

    switch (result.outcome) {
      case 'DELIVERED':
        await this.registry.markDelivered(registration.deviceToken);
        return false;

      case 'TRANSIENT_FAILURE':
        logger.warn('[Scheduler] Transient push failure, keeping device', {
          device,
          statusCode: result.statusCode,
          reason: result.reason,
          retryAfterSeconds: result.retryAfterSeconds,
        });
        return false;

      case 'PERMANENT_FAILURE':
        if (!result.evict) {
          logger.warn('[Scheduler] Push rejected, keeping device', {
            device,
            statusCode: result.statusCode,
            reason: result.reason,
          });
          return false;
        }

        if (!(await this.registry.evict(registration.deviceToken, registration.generation))) {
          logger.debug('[Scheduler] Device re-registered or removed before eviction', { device });
          return false;
        }

        logger.info('[Scheduler] Evicted device with invalid token', {
          device,
          statusCode: result.statusCode,
          reason: result.reason,
        });
        return true;
    }
  }

  private logDispatchError(registration: DeviceRegistration, error: unknown): void {
    const device = maskToken(registration.deviceToken);
    if (error instanceof NotFoundError) {
      logger.debug('[Scheduler] Device unregistered mid-dispatch, skipping', { device });
    } else if (error instanceof AppError && !error.isOperational) {
      logger.error('[Scheduler] Dispatch aborted by configuration error', { device, error });
    } else {
      logger.error('[Scheduler] Dispatch failed', { device, error });
    }
  }
}
