// =====================================================
// Feed Refresher
// =====================================================
// Keeps a per-user snapshot of calendar and mail data fresh.
// Each refresh hashes the fetched data; when it differs from
// the previous fetch the change handler fires so the user's
// devices get an out-of-cycle update. The first fetch for a
// user only records the baseline.
//
// Failures never propagate: a FeedUnavailableError is logged
// and the user's snapshot is cleared, so content falls back to
// placeholders until the next successful refresh.

import { createHash } from 'crypto';
import type { GoogleCredentials } from '@activity-relay/shared-types';
import { systemClock, type Clock } from '../../lib/clock';
import { logger } from '../../utils/logger';
import { FeedUnavailableError } from '../../utils/errors';
import type { DeviceRegistry } from '../registry/device-registry';
import { resolveTimezone } from './timezone.utils';
import type { FeedProvider, FeedReader, FeedSnapshot } from './feeds/types';

export type FeedChangeHandler = (userId: string) => Promise<unknown>;

export type ChannelNotificationOutcome =
  | 'ignored'
  | 'sync_acknowledged'
  | 'update_triggered'
  | 'resource_deleted'
  | 'unknown_state';

export interface FeedRefresherOptions {
  intervalMs: number;
  clock?: Clock;
  onChange?: FeedChangeHandler;
}

interface MonitoredUser {
  credentials: GoogleCredentials;
  snapshot: FeedSnapshot | null;
  digest: string | null;
  /** Webhook address calendar changes are pushed to, once a channel was requested */
  watchAddress: string | null;
}

interface ChannelRecord {
  userId: string;
  calendarId: string;
  expiresAt: Date | null;
}

function digestOf(snapshot: FeedSnapshot): string {
  return createHash('sha256')
    .update(JSON.stringify({ calendarEvents: snapshot.calendarEvents, emailSummary: snapshot.emailSummary }))
    .digest('hex');
}

export class FeedRefresher implements FeedReader {
  private readonly users = new Map<string, MonitoredUser>();
  private readonly channels = new Map<string, ChannelRecord>();
  private readonly clock: Clock;
  private readonly intervalMs: number;
  private onChange: FeedChangeHandler | null;
  private timer: NodeJS.Timeout | null = null;
  private running: Promise<void> | null = null;

  constructor(
    private readonly provider: FeedProvider | null,
    private readonly registry: DeviceRegistry,
    options: FeedRefresherOptions,
  ) {
    this.intervalMs = options.intervalMs;
    this.clock = options.clock ?? systemClock;
    this.onChange = options.onChange ?? null;
  }

  get isEnabled(): boolean {
    return this.provider !== null && this.provider.isConfigured();
  }

  get monitoredUsers(): number {
    return this.users.size;
  }

  setChangeHandler(handler: FeedChangeHandler): void {
    this.onChange = handler;
  }

  /**
   * Start monitoring a user and fetch their first snapshot.
   * Re-tracking replaces the credentials and keeps the current baseline.
   */
  async track(userId: string, credentials: GoogleCredentials): Promise<void> {
    const existing = this.users.get(userId);
    if (existing) {
      existing.credentials = credentials;
    } else {
      this.users.set(userId, { credentials, snapshot: null, digest: null, watchAddress: null });
    }

    await this.refreshUser(userId);
  }

  /**
   * Track a user and, when a webhook address is given, ask the provider to
   * push their calendar changes there. Feed failures are logged, never thrown.
   */
  async monitor(userId: string, credentials: GoogleCredentials, watchAddress?: string): Promise<void> {
    await this.track(userId, credentials);

    if (watchAddress && !this.hasChannel(userId)) {
      await this.registerChannel(userId, watchAddress);
    }
  }

  untrack(userId: string): void {
    this.users.delete(userId);
    for (const [channelId, channel] of this.channels) {
      if (channel.userId === userId) this.channels.delete(channelId);
    }
  }

  getSnapshot(userId: string): FeedSnapshot | null {
    return this.users.get(userId)?.snapshot ?? null;
  }

  /**
   * Fetch one user's data.
   *
   * @returns true when the data changed since the previous successful fetch
   */
  async refreshUser(userId: string): Promise<boolean> {
    const user = this.users.get(userId);
    if (!user || !this.provider || !this.provider.isConfigured()) {
      return false;
    }

    let snapshot: FeedSnapshot;
    try {
      const result = await this.provider.fetchSnapshot(user.credentials, this.timezoneOf(userId));
      snapshot = result.snapshot;
      user.credentials = result.credentials;
    } catch (error) {
      user.snapshot = null;
      if (error instanceof FeedUnavailableError) {
        logger.warn(`[FeedRefresher] ${error.message}`, { userId, retryable: error.retryable });
      } else {
        logger.error('[FeedRefresher] Unexpected feed failure', { userId, error });
      }
      return false;
    }

    const digest = digestOf(snapshot);
    const changed = user.digest !== null && user.digest !== digest;
    user.snapshot = snapshot;
    user.digest = digest;

    if (changed) {
      logger.info('[FeedRefresher] Feed data changed', { userId });
      await this.notify(userId);
    }

    return changed;
  }

  /**
   * Refresh every monitored user that still has a registered device.
   * Users whose devices are all gone stop being monitored.
   */
  async refreshAll(): Promise<void> {
    this.prune();

    const userIds = Array.from(this.users.keys());
    await Promise.allSettled(userIds.map((userId) => this.refreshUser(userId)));
    await this.renewExpiredChannels();
  }

  start(): void {
    if (this.timer) return;

    this.timer = setInterval(() => {
      void this.tick();
    }, this.intervalMs);
    this.timer.unref();

    logger.info(`[FeedRefresher] Refreshing every ${this.intervalMs}ms`);
  }

  async stop(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    if (this.running) {
      await this.running;
    }
  }

  // ===========================================
  // Calendar push channels
  // ===========================================

  /**
   * Open a calendar push channel for a tracked user. The channel is only
   * recorded once the provider accepted it.
   *
   * @returns the channel id, or null when no channel could be opened
   */
  async registerChannel(userId: string, address: string, calendarId: string = 'primary'): Promise<string | null> {
    const user = this.users.get(userId);
    const provider = this.provider;
    if (!user || !provider?.watchCalendar) {
      return null;
    }

    user.watchAddress = address;
    const channelId = `relay_${userId}_${calendarId}_${Math.floor(this.clock.now() / 1000)}`;

    try {
      const channel = await provider.watchCalendar(user.credentials, { channelId, address, calendarId });
      this.channels.set(channelId, { userId, calendarId, expiresAt: channel.expiresAt });
      logger.info('[FeedRefresher] Calendar channel registered', {
        channelId,
        userId,
        expiresAt: channel.expiresAt?.toISOString(),
      });
      return channelId;
    } catch (error) {
      if (error instanceof FeedUnavailableError) {
        logger.warn(`[FeedRefresher] Calendar channel not opened: ${error.message}`, { userId });
      } else {
        logger.error('[FeedRefresher] Unexpected failure opening calendar channel', { userId, error });
      }
      return null;
    }
  }

  hasChannel(userId: string): boolean {
    for (const channel of this.channels.values()) {
      if (channel.userId === userId) return true;
    }
    return false;
  }

  channelOwner(channelId: string): string | undefined {
    return this.channels.get(channelId)?.userId;
  }

  /**
   * React to a calendar push notification. An `exists` notification
   * refreshes the user's data and always sends their devices an update.
   */
  async handleChannelNotification(
    channelId: string | undefined,
    resourceState: string | undefined,
  ): Promise<ChannelNotificationOutcome> {
    const userId = channelId ? this.channels.get(channelId)?.userId : undefined;
    if (!userId) {
      logger.warn('[FeedRefresher] Notification for unknown channel', { channelId });
      return 'ignored';
    }

    switch (resourceState) {
      case 'sync':
        return 'sync_acknowledged';
      case 'exists': {
        const changed = await this.refreshUser(userId);
        if (!changed) {
          await this.notify(userId);
        }
        return 'update_triggered';
      }
      case 'not_exists':
        logger.info('[FeedRefresher] Calendar resource deleted', { userId });
        return 'resource_deleted';
      default:
        logger.warn('[FeedRefresher] Unknown resource state', { channelId, resourceState });
        return 'unknown_state';
    }
  }

  // ===========================================
  // Private Methods
  // ===========================================

  private async tick(): Promise<void> {
    if (this.running) {
      logger.debug('[FeedRefresher] Previous refresh still running, skipping');
      return;
    }

    this.running = this.refreshAll();
    try {
      await this.running;
    } finally {
      this.running = null;
    }
  }

  /**
   * Zone of the user's most recently synced device that reported one.
   */
  private timezoneOf(userId: string): string | undefined {
    const zones = this.registry
      .listByUser(userId)
      .filter((registration) => registration.synced.timezone !== undefined)
      .sort((a, b) => (b.synced.syncedAt?.getTime() ?? 0) - (a.synced.syncedAt?.getTime() ?? 0));

    const [latest] = zones;
    return latest ? resolveTimezone(latest.synced.timezone) : undefined;
  }

  /**
   * Re-open channels the provider has expired, at the address they were opened with.
   */
  private async renewExpiredChannels(): Promise<void> {
    const now = this.clock.now();
    const expired: ChannelRecord[] = [];

    for (const [channelId, channel] of this.channels) {
      if (channel.expiresAt && channel.expiresAt.getTime() <= now) {
        this.channels.delete(channelId);
        expired.push(channel);
      }
    }

    for (const channel of expired) {
      const address = this.users.get(channel.userId)?.watchAddress;
      if (address && !this.hasChannel(channel.userId)) {
        logger.info('[FeedRefresher] Calendar channel expired, renewing', { userId: channel.userId });
        await this.registerChannel(channel.userId, address, channel.calendarId);
      }
    }
  }

  private prune(): void {
    const withDevices = new Set<string>();
    for (const registration of this.registry.list()) {
      if (registration.userId) withDevices.add(registration.userId);
    }

    for (const userId of Array.from(this.users.keys())) {
      if (!withDevices.has(userId)) {
        logger.debug('[FeedRefresher] No devices left, stopping monitoring', { userId });
        this.untrack(userId);
      }
    }
  }

  private async notify(userId: string): Promise<void> {
    if (!this.onChange) return;

    try {
      await this.onChange(userId);
    } catch (error) {
      logger.error('[FeedRefresher] Change handler failed', { userId, error });
    }
  }
}
