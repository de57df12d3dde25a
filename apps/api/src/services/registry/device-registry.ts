// =====================================================
// Device Registry
// =====================================================
// In-memory store of live activity registrations, keyed by
// device token. Contents live for the process lifetime only:
// after a restart every device must register again.
//
// CONCURRENCY: the rotation tick and inbound requests both
// mutate entries. Every mutation runs under a per-token lock,
// and eviction only removes the registration generation the
// tick observed, so a re-register racing an eviction wins.

import {
  ERROR_CODES,
  type CalendarEventSummary,
  type EmailSummary,
  type GoogleCredentials,
  type WeatherSnapshot,
} from '@activity-relay/shared-types';
import { KeyedLock } from '../../lib/keyed-lock';
import { systemClock, type Clock } from '../../lib/clock';
import { NotFoundError } from '../../utils/errors';

// =====================================================
// Types
// =====================================================

/**
 * State the client uploads before going to the background.
 */
export interface SyncedDeviceState {
  calendarEvents?: CalendarEventSummary[];
  emailSummary?: EmailSummary;
  weather?: WeatherSnapshot;
  timezone?: string;
  syncedAt?: Date;
}

export interface DeviceRegistration {
  deviceToken: string;
  activityId: string;
  userId: string | null;
  rotationIndex: number;
  /** Per-activity push token; pushes go here instead of the device token when set */
  liveActivityPushToken: string | null;
  googleCredentials: GoogleCredentials | null;
  registeredAt: Date;
  lastUpdateAt: Date | null;
  /** Last `aps.timestamp` sent, in seconds */
  lastPushTimestamp: number;
  /** Bumped on every register so stale evictions can be detected */
  generation: number;
  synced: SyncedDeviceState;
}

export interface RegisterDeviceInput {
  deviceToken: string;
  activityId: string;
  userId?: string | null;
  liveActivityPushToken?: string | null;
  googleCredentials?: GoogleCredentials | null;
}

function snapshot(registration: DeviceRegistration): DeviceRegistration {
  return {
    ...registration,
    synced: { ...registration.synced },
  };
}

/**
 * Destination token for pushes to this registration.
 */
export function pushTargetOf(registration: DeviceRegistration): string {
  return registration.liveActivityPushToken ?? registration.deviceToken;
}

// =====================================================
// Registry
// =====================================================

export class DeviceRegistry {
  private readonly devices = new Map<string, DeviceRegistration>();
  private readonly lock = new KeyedLock();
  private generationCounter = 0;

  constructor(private readonly clock: Clock = systemClock) {}

  /**
   * Insert or replace the entry for `deviceToken`. Rotation restarts at 0.
   */
  register(input: RegisterDeviceInput): Promise<DeviceRegistration> {
    return this.lock.run(input.deviceToken, () => {
      const registration: DeviceRegistration = {
        deviceToken: input.deviceToken,
        activityId: input.activityId,
        userId: input.userId ?? null,
        rotationIndex: 0,
        liveActivityPushToken: input.liveActivityPushToken ?? null,
        googleCredentials: input.googleCredentials ?? null,
        registeredAt: new Date(this.clock.now()),
        lastUpdateAt: null,
        lastPushTimestamp: this.devices.get(input.deviceToken)?.lastPushTimestamp ?? 0,
        generation: ++this.generationCounter,
        synced: {},
      };

      this.devices.set(input.deviceToken, registration);
      return snapshot(registration);
    });
  }

  /**
   * Remove the entry. Absent tokens are a no-op.
   *
   * @returns whether an entry was removed
   */
  unregister(deviceToken: string): Promise<boolean> {
    return this.lock.run(deviceToken, () => this.devices.delete(deviceToken));
  }

  /**
   * Remove the entry only if it is still the registration generation the
   * caller dispatched to. A device that re-registered in the meantime stays.
   */
  evict(deviceToken: string, generation: number): Promise<boolean> {
    return this.lock.run(deviceToken, () => {
      const current = this.devices.get(deviceToken);
      if (!current || current.generation !== generation) {
        return false;
      }
      return this.devices.delete(deviceToken);
    });
  }

  /**
   * Increment the rotation cursor and return the new value.
   * The caller maps it onto the content cycle.
   *
   * @throws {NotFoundError} when the device is no longer registered
   */
  advanceRotation(deviceToken: string): Promise<number> {
    return this.lock.run(deviceToken, () => {
      const registration = this.require(deviceToken);
      registration.rotationIndex += 1;
      return registration.rotationIndex;
    });
  }

  /**
   * Reserve the `aps.timestamp` for the next push to this device.
   * Strictly increasing per device even when two pushes land in the same second.
   */
  nextPushTimestamp(deviceToken: string): Promise<number> {
    return this.lock.run(deviceToken, () => {
      const registration = this.require(deviceToken);
      const nowSeconds = Math.floor(this.clock.now() / 1000);
      const timestamp = Math.max(nowSeconds, registration.lastPushTimestamp + 1);
      registration.lastPushTimestamp = timestamp;
      return timestamp;
    });
  }

  /**
   * Record a delivered push.
   */
  markDelivered(deviceToken: string): Promise<void> {
    return this.lock.run(deviceToken, () => {
      const registration = this.devices.get(deviceToken);
      if (registration) {
        registration.lastUpdateAt = new Date(this.clock.now());
      }
    });
  }

  /**
   * Merge client-synced state. Fields left undefined keep their previous value.
   *
   * @throws {NotFoundError} when the device is not registered
   */
  syncState(deviceToken: string, state: Omit<SyncedDeviceState, 'syncedAt'>): Promise<DeviceRegistration> {
    return this.lock.run(deviceToken, () => {
      const registration = this.require(deviceToken);
      const merged: SyncedDeviceState = { ...registration.synced };

      if (state.calendarEvents !== undefined) merged.calendarEvents = state.calendarEvents;
      if (state.emailSummary !== undefined) merged.emailSummary = state.emailSummary;
      if (state.weather !== undefined) merged.weather = state.weather;
      if (state.timezone !== undefined) merged.timezone = state.timezone;
      merged.syncedAt = new Date(this.clock.now());

      registration.synced = merged;
      return snapshot(registration);
    });
  }

  get(deviceToken: string): DeviceRegistration | undefined {
    const registration = this.devices.get(deviceToken);
    return registration ? snapshot(registration) : undefined;
  }

  /**
   * Point-in-time copy of every registration.
   */
  list(): DeviceRegistration[] {
    return Array.from(this.devices.values(), snapshot);
  }

  listByUser(userId: string): DeviceRegistration[] {
    return this.list().filter((registration) => registration.userId === userId);
  }

  get size(): number {
    return this.devices.size;
  }

  private require(deviceToken: string): DeviceRegistration {
    const registration = this.devices.get(deviceToken);
    if (!registration) {
      throw new NotFoundError('Device not registered', ERROR_CODES.DEVICE_NOT_FOUND);
    }
    return registration;
  }
}
