// =====================================================
// Feed Refresher Test Suite
// =====================================================

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import type { GoogleCredentials } from '@activity-relay/shared-types';
import { ManualClock } from '../../../lib/clock';
import { FeedUnavailableError } from '../../../utils/errors';
import { DeviceRegistry } from '../../registry/device-registry';
import { FeedRefresher } from '../feed.refresher';
import type {
  CalendarChannel,
  CalendarWatchRequest,
  FeedFetchResult,
  FeedProvider,
  FeedSnapshot,
} from '../feeds/types';

const DEVICE = 'a'.repeat(64);
const CREDENTIALS: GoogleCredentials = { accessToken: 'test-access', refreshToken: 'test-refresh' };

function snapshotWith(titles: string[]): FeedSnapshot {
  return {
    calendarEvents: titles.map((title) => ({ title, time: '9:00 AM' })),
    emailSummary: { unreadCount: 0, recentEmails: [] },
    fetchedAt: new Date(0),
  };
}

function fakeProvider(fetch: (credentials: GoogleCredentials) => Promise<FeedFetchResult>) {
  return {
    providerId: 'fake',
    providerName: 'Fake Feed',
    isConfigured: () => true,
    fetchSnapshot: vi.fn(fetch),
  } satisfies FeedProvider;
}

function resultFor(snapshot: FeedSnapshot, credentials: GoogleCredentials = CREDENTIALS): FeedFetchResult {
  return { snapshot, credentials };
}

describe('FeedRefresher', () => {
  let clock: ManualClock;
  let registry: DeviceRegistry;

  beforeEach(async () => {
    clock = new ManualClock(Date.parse('2024-03-15T17:00:00.000Z'));
    registry = new DeviceRegistry(clock);
    await registry.register({ deviceToken: DEVICE, activityId: 'activity-1', userId: 'user-1' });
  });

  describe('track', () => {
    it('fetches an initial snapshot without reporting a change', async () => {
      const onChange = vi.fn(async () => undefined);
      const provider = fakeProvider(async () => resultFor(snapshotWith(['Standup'])));
      const refresher = new FeedRefresher(provider, registry, { intervalMs: 1000, clock, onChange });

      await refresher.track('user-1', CREDENTIALS);

      expect(refresher.monitoredUsers).toBe(1);
      expect(refresher.getSnapshot('user-1')?.calendarEvents[0].title).toBe('Standup');
      expect(onChange).not.toHaveBeenCalled();
    });

    it('keeps refreshed credentials for the next fetch', async () => {
      const provider = fakeProvider(async () =>
        resultFor(snapshotWith([]), { accessToken: 'test-access-2', refreshToken: 'test-refresh' }),
      );
      const refresher = new FeedRefresher(provider, registry, { intervalMs: 1000, clock });

      await refresher.track('user-1', CREDENTIALS);
      await refresher.refreshUser('user-1');

      expect(provider.fetchSnapshot).toHaveBeenLastCalledWith({
        accessToken: 'test-access-2',
        refreshToken: 'test-refresh',
      });
    });
  });

  describe('refreshUser', () => {
    it('reports a change and notifies when the data differs', async () => {
      const snapshots = [snapshotWith(['Standup']), snapshotWith(['Standup', 'Lunch'])];
      const provider = fakeProvider(async () => resultFor(snapshots.shift() ?? snapshotWith([])));
      const onChange = vi.fn(async () => undefined);
      const refresher = new FeedRefresher(provider, registry, { intervalMs: 1000, clock, onChange });

      await refresher.track('user-1', CREDENTIALS);
      const changed = await refresher.refreshUser('user-1');

      expect(changed).toBe(true);
      expect(onChange).toHaveBeenCalledTimes(1);
      expect(onChange).toHaveBeenCalledWith('user-1');
    });

    it('does not notify when only the fetch time differs', async () => {
      const provider = fakeProvider(async () => resultFor({ ...snapshotWith(['Standup']), fetchedAt: new Date() }));
      const onChange = vi.fn(async () => undefined);
      const refresher = new FeedRefresher(provider, registry, { intervalMs: 1000, clock, onChange });

      await refresher.track('user-1', CREDENTIALS);

      expect(await refresher.refreshUser('user-1')).toBe(false);
      expect(onChange).not.toHaveBeenCalled();
    });

    it('clears the snapshot when the feed is unavailable', async () => {
      let fail = false;
      const provider = fakeProvider(async () => {
        if (fail) throw new FeedUnavailableError('fake', 'HTTP 503');
        return resultFor(snapshotWith(['Standup']));
      });
      const refresher = new FeedRefresher(provider, registry, { intervalMs: 1000, clock });

      await refresher.track('user-1', CREDENTIALS);
      fail = true;

      await expect(refresher.refreshUser('user-1')).resolves.toBe(false);
      expect(refresher.getSnapshot('user-1')).toBeNull();
    });

    it('does not reject when the change handler fails', async () => {
      const snapshots = [snapshotWith(['A']), snapshotWith(['B'])];
      const provider = fakeProvider(async () => resultFor(snapshots.shift() ?? snapshotWith([])));
      const onChange = vi.fn(async () => {
        throw new Error('dispatch failed');
      });
      const refresher = new FeedRefresher(provider, registry, { intervalMs: 1000, clock, onChange });

      await refresher.track('user-1', CREDENTIALS);

      await expect(refresher.refreshUser('user-1')).resolves.toBe(true);
    });

    it('does nothing without a provider', async () => {
      const refresher = new FeedRefresher(null, registry, { intervalMs: 1000, clock });

      await refresher.track('user-1', CREDENTIALS);

      expect(refresher.getSnapshot('user-1')).toBeNull();
      expect(await refresher.refreshUser('user-1')).toBe(false);
    });
  });

  describe('refreshAll', () => {
    it('stops monitoring users whose devices are gone', async () => {
      const provider = fakeProvider(async () => resultFor(snapshotWith([])));
      const refresher = new FeedRefresher(provider, registry, { intervalMs: 1000, clock });

      await refresher.track('user-1', CREDENTIALS);
      await refresher.track('user-2', CREDENTIALS);
      provider.fetchSnapshot.mockClear();

      await refresher.refreshAll();

      expect(refresher.monitoredUsers).toBe(1);
      expect(provider.fetchSnapshot).toHaveBeenCalledTimes(1);
    });
  });

  describe('timer loop', () => {
    beforeEach(() => {
      vi.useFakeTimers();
    });

    afterEach(() => {
      vi.useRealTimers();
    });

    it('refreshes on every interval until stopped', async () => {
      const provider = fakeProvider(async () => resultFor(snapshotWith([])));
      const refresher = new FeedRefresher(provider, registry, { intervalMs: 1000, clock });
      await refresher.track('user-1', CREDENTIALS);
      provider.fetchSnapshot.mockClear();

      refresher.start();
      await vi.advanceTimersByTimeAsync(3000);
      await refresher.stop();
      await vi.advanceTimersByTimeAsync(3000);

      expect(provider.fetchSnapshot).toHaveBeenCalledTimes(3);
    });

    it('skips an interval while the previous refresh is still running', async () => {
      const provider = fakeProvider(
        () => new Promise<FeedFetchResult>((resolve) => setTimeout(() => resolve(resultFor(snapshotWith([]))), 2500)),
      );
      const refresher = new FeedRefresher(provider, registry, { intervalMs: 1000, clock });
      const tracked = refresher.track('user-1', CREDENTIALS);
      await vi.advanceTimersByTimeAsync(2500);
      await tracked;
      provider.fetchSnapshot.mockClear();

      refresher.start();
      // Refresh starts at 1000 and finishes at 3500; ticks at 2000 and 3000 are skipped
      await vi.advanceTimersByTimeAsync(3500);

      expect(provider.fetchSnapshot).toHaveBeenCalledTimes(1);
      await refresher.stop();
    });
  });

  describe('time zones', () => {
    it('fetches in the zone the user last synced', async () => {
      await registry.syncState(DEVICE, { timezone: 'America/Los_Angeles' });
      const provider = fakeProvider(async () => resultFor(snapshotWith([])));
      const refresher = new FeedRefresher(provider, registry, { intervalMs: 1000, clock });

      await refresher.track('user-1', CREDENTIALS);

      expect(provider.fetchSnapshot).toHaveBeenCalledWith(CREDENTIALS, 'America/Los_Angeles');
    });

    it('leaves the zone to the provider when none was synced', async () => {
      const provider = fakeProvider(async () => resultFor(snapshotWith([])));
      const refresher = new FeedRefresher(provider, registry, { intervalMs: 1000, clock });

      await refresher.track('user-1', CREDENTIALS);

      expect(provider.fetchSnapshot).toHaveBeenCalledWith(CREDENTIALS, undefined);
    });
  });

  describe('calendar channels', () => {
    const ADDRESS = 'https://relay.example.test/api/v1/webhooks/google/calendar';

    function watchingProvider(expiresAt: Date | null = null) {
      return {
        ...fakeProvider(async () => resultFor(snapshotWith(['Standup']))),
        watchCalendar: vi.fn(
          async (_credentials: GoogleCredentials, request: CalendarWatchRequest): Promise<CalendarChannel> => ({
            channelId: request.channelId,
            resourceId: 'resource-1',
            expiresAt,
          }),
        ),
      } satisfies FeedProvider;
    }

    it('ignores unknown channels', async () => {
      const refresher = new FeedRefresher(null, registry, { intervalMs: 1000, clock });

      expect(await refresher.handleChannelNotification('missing', 'exists')).toBe('ignored');
      expect(await refresher.handleChannelNotification(undefined, 'exists')).toBe('ignored');
    });

    it('opens a channel with the provider and records it', async () => {
      const provider = watchingProvider();
      const refresher = new FeedRefresher(provider, registry, { intervalMs: 1000, clock });
      await refresher.track('user-1', CREDENTIALS);

      const channelId = await refresher.registerChannel('user-1', ADDRESS);

      const expectedId = `relay_user-1_primary_${Math.floor(clock.now() / 1000)}`;
      expect(channelId).toBe(expectedId);
      expect(provider.watchCalendar).toHaveBeenCalledWith(CREDENTIALS, {
        channelId: expectedId,
        address: ADDRESS,
        calendarId: 'primary',
      });
      expect(refresher.channelOwner(expectedId)).toBe('user-1');
    });

    it('does not record a channel the provider rejected', async () => {
      const provider = watchingProvider();
      provider.watchCalendar.mockRejectedValueOnce(new FeedUnavailableError('fake', 'unauthenticated', false));
      const refresher = new FeedRefresher(provider, registry, { intervalMs: 1000, clock });
      await refresher.track('user-1', CREDENTIALS);

      expect(await refresher.registerChannel('user-1', ADDRESS)).toBeNull();
      expect(refresher.hasChannel('user-1')).toBe(false);
    });

    it('opens no channel without push support or for untracked users', async () => {
      const pollOnly = new FeedRefresher(fakeProvider(async () => resultFor(snapshotWith([]))), registry, {
        intervalMs: 1000,
        clock,
      });
      await pollOnly.track('user-1', CREDENTIALS);
      expect(await pollOnly.registerChannel('user-1', ADDRESS)).toBeNull();

      const provider = watchingProvider();
      const refresher = new FeedRefresher(provider, registry, { intervalMs: 1000, clock });
      expect(await refresher.registerChannel('user-1', ADDRESS)).toBeNull();
      expect(provider.watchCalendar).not.toHaveBeenCalled();
    });

    it('acknowledges sync notifications without dispatching', async () => {
      const onChange = vi.fn(async () => undefined);
      const refresher = new FeedRefresher(watchingProvider(), registry, { intervalMs: 1000, clock, onChange });
      await refresher.track('user-1', CREDENTIALS);
      const channelId = await refresher.registerChannel('user-1', ADDRESS);

      expect(await refresher.handleChannelNotification(channelId ?? undefined, 'sync')).toBe('sync_acknowledged');
      expect(onChange).not.toHaveBeenCalled();
    });

    it('refreshes and dispatches once on exists', async () => {
      const provider = watchingProvider();
      const onChange = vi.fn(async () => undefined);
      const refresher = new FeedRefresher(provider, registry, { intervalMs: 1000, clock, onChange });
      await refresher.track('user-1', CREDENTIALS);
      const channelId = await refresher.registerChannel('user-1', ADDRESS);

      expect(await refresher.handleChannelNotification(channelId ?? undefined, 'exists')).toBe('update_triggered');
      expect(provider.fetchSnapshot).toHaveBeenCalledTimes(2);
      expect(onChange).toHaveBeenCalledTimes(1);
    });

    it('monitors a user and opens their channel only once', async () => {
      const provider = watchingProvider();
      const refresher = new FeedRefresher(provider, registry, { intervalMs: 1000, clock });

      await refresher.monitor('user-1', CREDENTIALS, ADDRESS);
      await refresher.monitor('user-1', CREDENTIALS, ADDRESS);

      expect(refresher.monitoredUsers).toBe(1);
      expect(provider.fetchSnapshot).toHaveBeenCalledTimes(2);
      expect(provider.watchCalendar).toHaveBeenCalledTimes(1);
      expect(refresher.hasChannel('user-1')).toBe(true);
    });

    it('renews expired channels on the next refresh', async () => {
      const provider = watchingProvider(new Date(clock.now() + 1000));
      const refresher = new FeedRefresher(provider, registry, { intervalMs: 1000, clock });
      await refresher.monitor('user-1', CREDENTIALS, ADDRESS);
      const firstId = `relay_user-1_primary_${Math.floor(clock.now() / 1000)}`;

      clock.advance(2000);
      await refresher.refreshAll();

      const renewedId = `relay_user-1_primary_${Math.floor(clock.now() / 1000)}`;
      expect(provider.watchCalendar).toHaveBeenCalledTimes(2);
      expect(refresher.channelOwner(firstId)).toBeUndefined();
      expect(refresher.channelOwner(renewedId)).toBe('user-1');
    });

    it('drops channels when a user stops being monitored', async () => {
      const refresher = new FeedRefresher(watchingProvider(), registry, { intervalMs: 1000, clock });
      await refresher.monitor('user-1', CREDENTIALS, ADDRESS);

      refresher.untrack('user-1');

      expect(refresher.hasChannel('user-1')).toBe(false);
    });
  });
});
