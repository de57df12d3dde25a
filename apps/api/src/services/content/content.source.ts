// =====================================================
// Content Source
// =====================================================
// Builds the content state for a rotation slot. Data comes
// from, in order of preference: state the device synced,
// the user's feed snapshot, then fixed placeholder content.
// Never throws and never blocks on the network: the feed is
// read from the refresher's cache.

import type {
  CalendarEventSummary,
  ContentSlot,
  ContentState,
  EmailSummary,
  WeatherSnapshot,
} from '@activity-relay/shared-types';
import { systemClock, type Clock } from '../../lib/clock';
import type { SyncedDeviceState } from '../registry/device-registry';
import type { FeedReader, FeedSnapshot } from './feeds/types';
import { PLACEHOLDER_CONTENT } from './placeholders';
import {
  formatClock,
  formatDisplayDate,
  getLocalTime,
  isDarkHour,
  resolveTimezone,
} from './timezone.utils';

interface ResolvedData {
  calendarEvents: CalendarEventSummary[];
  emailSummary: EmailSummary | null;
  weather: WeatherSnapshot | null;
  feedUsed: boolean;
}

function weatherFields(weather: WeatherSnapshot): Partial<ContentState> {
  const fields: Partial<ContentState> = {};
  if (weather.temp !== undefined) fields.weatherTemp = weather.temp;
  if (weather.condition !== undefined) fields.weatherCondition = weather.condition;
  if (weather.icon !== undefined) fields.weatherIcon = weather.icon;
  if (weather.sunrise !== undefined) fields.sunriseTime = weather.sunrise;
  if (weather.sunset !== undefined) fields.sunsetTime = weather.sunset;
  if (weather.location !== undefined) fields.locationName = weather.location;
  return fields;
}

function nextEventFields(events: CalendarEventSummary[]): Partial<ContentState> {
  const [next] = events;
  return next ? { nextEventTitle: next.title, nextEventTime: next.time } : {};
}

function emailFields(summary: EmailSummary): Partial<ContentState> {
  const fields: Partial<ContentState> = { unreadEmailCount: summary.unreadCount };
  const [top] = summary.recentEmails;
  if (top) {
    fields.topEmailSenders = top.sender;
    fields.topEmailSubject = top.subject;
    fields.topEmailTime = top.time;
  }
  return fields;
}

export class ContentSource {
  constructor(
    private readonly feed: FeedReader | null = null,
    private readonly clock: Clock = systemClock,
  ) {}

  getContent(slot: ContentSlot, userId?: string | null, synced: SyncedDeviceState = {}): ContentState {
    const timezone = resolveTimezone(synced.timezone);
    const now = new Date(this.clock.now());
    const { hours } = getLocalTime(timezone, now);
    const data = this.resolve(userId, synced);

    const state: ContentState = {
      callStatus: 'Ready',
      duration: 0,
      transcript: `Updated at ${formatClock(timezone, now)}`,
      isSpeaking: false,
      companionMode: 'idle',
      isIdleMode: true,
      isDarkMode: isDarkHour(hours),
      currentDate: formatDisplayDate(timezone, now),
      intelligentIslandType: slot,
      isGoogleConnected: data.feedUsed,
      ...(data.weather ? weatherFields(data.weather) : {}),
    };

    return { ...state, ...this.slotContent(slot, data) };
  }

  private slotContent(slot: ContentSlot, data: ResolvedData): Partial<ContentState> {
    const unread = data.emailSummary && data.emailSummary.unreadCount > 0 ? data.emailSummary : null;

    switch (slot) {
      case 'dashboard':
        return {
          ...PLACEHOLDER_CONTENT.dashboard,
          ...nextEventFields(data.calendarEvents),
          ...(unread ? emailFields(unread) : {}),
        };

      case 'news':
        return { ...PLACEHOLDER_CONTENT.news };

      case 'weather':
        if (!data.weather) return { ...PLACEHOLDER_CONTENT.weather };
        return {
          suggestion: data.weather.location ? `Weather in ${data.weather.location}` : 'Current weather',
          suggestionIcon: data.weather.icon ?? 'cloud.sun.fill',
        };

      case 'calendar': {
        const count = data.calendarEvents.length;
        if (count === 0) return { ...PLACEHOLDER_CONTENT.calendar };
        return {
          ...nextEventFields(data.calendarEvents),
          suggestion: count === 1 ? '1 meeting today' : `${count} meetings today`,
          suggestionIcon: 'calendar.badge.clock',
        };
      }

      case 'email':
        if (!unread) return { ...PLACEHOLDER_CONTENT.email };
        return {
          ...emailFields(unread),
          suggestion: unread.unreadCount === 1 ? '1 unread email' : `${unread.unreadCount} unread emails`,
          suggestionIcon: 'envelope.badge.fill',
        };
    }
  }

  private resolve(userId: string | null | undefined, synced: SyncedDeviceState): ResolvedData {
    const snapshot: FeedSnapshot | null = userId && this.feed ? this.feed.getSnapshot(userId) : null;

    const syncedEvents = synced.calendarEvents ?? [];
    const syncedEmail = synced.emailSummary && synced.emailSummary.unreadCount > 0 ? synced.emailSummary : null;

    return {
      calendarEvents: syncedEvents.length > 0 ? syncedEvents : snapshot?.calendarEvents ?? [],
      emailSummary: syncedEmail ?? snapshot?.emailSummary ?? null,
      weather: synced.weather ?? null,
      feedUsed: snapshot !== null,
    };
  }
}
