// =====================================================
// Google Calendar + Gmail Feed
// =====================================================
// Reads today's calendar and the unread inbox on behalf of a
// user, using the OAuth credentials their device handed over.
// An expired access token is refreshed once per fetch when a
// refresh token and OAuth client credentials are available.

import axios, { AxiosError, type AxiosInstance } from 'axios';
import type {
  CalendarEventSummary,
  EmailPreview,
  EmailSummary,
  GoogleCredentials,
} from '@activity-relay/shared-types';
import { config } from '../../../config';
import { systemClock, type Clock } from '../../../lib/clock';
import { logger } from '../../../utils/logger';
import { FeedUnavailableError } from '../../../utils/errors';
import { DEFAULT_TIMEZONE, formatTimeOfDay, getEndOfLocalDay, resolveTimezone } from '../timezone.utils';
import type { CalendarChannel, CalendarWatchRequest, FeedFetchResult, FeedProvider } from './types';

// ===========================================
// Google API Response Types (Raw)
// ===========================================

interface GoogleEventTime {
  dateTime?: string;
  date?: string;
  timeZone?: string;
}

interface GoogleAttendee {
  email?: string;
  displayName?: string;
  self?: boolean;
}

interface GoogleCalendarEvent {
  summary?: string;
  start?: GoogleEventTime;
  attendees?: GoogleAttendee[];
}

interface GoogleEventsResponse {
  items?: GoogleCalendarEvent[];
}

interface GmailMessageRef {
  id: string;
}

interface GmailListResponse {
  messages?: GmailMessageRef[];
  resultSizeEstimate?: number;
}

interface GmailHeader {
  name: string;
  value: string;
}

interface GmailMessage {
  payload?: { headers?: GmailHeader[] };
}

interface GoogleChannelResponse {
  id: string;
  resourceId?: string;
  /** Milliseconds since the epoch, as a decimal string */
  expiration?: string;
}

interface TokenRefreshResponse {
  access_token: string;
}

// ===========================================
// Constants
// ===========================================

const CALENDAR_BASE_URL = 'https://www.googleapis.com/calendar/v3/calendars';
const PRIMARY_CALENDAR = 'primary';
const GMAIL_MESSAGES_URL = 'https://gmail.googleapis.com/gmail/v1/users/me/messages';
const TOKEN_URL = 'https://oauth2.googleapis.com/token';
const MAX_EVENTS = 10;
const MAX_RECENT_EMAILS = 3;
const MAX_ATTENDEES = 3;
const UNREAD_QUERY = 'is:unread in:inbox';

export interface GoogleFeedOptions {
  clientId?: string;
  clientSecret?: string;
  /** Zone used when the user's own zone is unknown */
  timezone?: string;
  clock?: Clock;
  http?: AxiosInstance;
}

// ===========================================
// Helper Functions
// ===========================================

/**
 * "Jane Doe <jane@example.com>" → "Jane Doe"
 */
export function parseSenderName(from: string): string {
  const angle = from.indexOf('<');
  if (angle === -1) return from.trim();
  const name = from.slice(0, angle).trim().replace(/^"|"$/g, '');
  return name || from.slice(angle + 1, from.indexOf('>', angle)).trim();
}

function headerValue(headers: GmailHeader[], name: string): string | undefined {
  return headers.find((h) => h.name.toLowerCase() === name.toLowerCase())?.value;
}

function calendarEventsUrl(calendarId: string): string {
  return `${CALENDAR_BASE_URL}/${encodeURIComponent(calendarId)}/events`;
}

function attendeeNames(attendees: GoogleAttendee[] | undefined): string | undefined {
  if (!attendees) return undefined;

  const names = attendees
    .filter((a) => !a.self)
    .slice(0, MAX_ATTENDEES)
    .map((a) => a.displayName ?? a.email?.split('@')[0] ?? '')
    .filter((name) => name.length > 0);

  return names.length > 0 ? names.join(', ') : undefined;
}

// ===========================================
// Google Feed Provider
// ===========================================

export class GoogleFeedProvider implements FeedProvider {
  readonly providerId = 'google';
  readonly providerName = 'Google Calendar & Gmail';

  private readonly http: AxiosInstance;
  private readonly clientId: string;
  private readonly clientSecret: string;
  private readonly timezone: string;
  private readonly clock: Clock;

  constructor(options: GoogleFeedOptions = {}) {
    this.clientId = options.clientId ?? config.feed.googleClientId;
    this.clientSecret = options.clientSecret ?? config.feed.googleClientSecret;
    this.timezone = options.timezone ?? DEFAULT_TIMEZONE;
    this.clock = options.clock ?? systemClock;

    this.http =
      options.http ??
      axios.create({
        timeout: 15000,
        headers: { Accept: 'application/json' },
      });
  }

  /**
   * The feed works with per-user access tokens alone; client credentials
   * are only needed to refresh them.
   */
  isConfigured(): boolean {
    return true;
  }

  canRefresh(credentials: GoogleCredentials): boolean {
    return Boolean(credentials.refreshToken && this.clientId && this.clientSecret);
  }

  /**
   * Read today's events and the unread inbox. With a `timezone`, "today"
   * and all clock times follow the user's zone; without one, event times
   * keep the zone the event was scheduled in.
   */
  async fetchSnapshot(credentials: GoogleCredentials, timezone?: string): Promise<FeedFetchResult> {
    try {
      return await this.fetchWith(credentials, timezone);
    } catch (error) {
      if (!isUnauthorized(error) || !this.canRefresh(credentials)) {
        throw this.wrapError(error);
      }
    }

    logger.info('[GoogleFeed] Access token rejected, refreshing');
    const refreshed = await this.refreshAccessToken(credentials);

    try {
      return await this.fetchWith(refreshed, timezone);
    } catch (error) {
      throw this.wrapError(error);
    }
  }

  /**
   * Ask Google to post change notifications for a calendar to `address`.
   */
  async watchCalendar(credentials: GoogleCredentials, request: CalendarWatchRequest): Promise<CalendarChannel> {
    try {
      const response = await this.http.post<GoogleChannelResponse>(
        `${calendarEventsUrl(request.calendarId)}/watch`,
        { id: request.channelId, type: 'web_hook', address: request.address },
        { headers: { Authorization: `Bearer ${credentials.accessToken}` } },
      );

      const expiration = response.data.expiration ? Number(response.data.expiration) : NaN;
      return {
        channelId: response.data.id,
        resourceId: response.data.resourceId ?? null,
        expiresAt: Number.isNaN(expiration) ? null : new Date(expiration),
      };
    } catch (error) {
      throw this.wrapError(error);
    }
  }

  // ===========================================
  // Private Methods
  // ===========================================

  private async fetchWith(credentials: GoogleCredentials, timezone: string | undefined): Promise<FeedFetchResult> {
    const headers = { Authorization: `Bearer ${credentials.accessToken}` };
    const zone = resolveTimezone(timezone, this.timezone);
    const [calendarEvents, emailSummary] = await Promise.all([
      this.fetchTodayEvents(headers, zone, timezone !== undefined),
      this.fetchUnreadEmails(headers, zone),
    ]);

    return {
      snapshot: {
        calendarEvents,
        emailSummary,
        fetchedAt: new Date(this.clock.now()),
      },
      credentials,
    };
  }

  /**
   * @param zone - zone that bounds "today"
   * @param userZone - render times in `zone` instead of each event's own zone
   */
  private async fetchTodayEvents(
    headers: Record<string, string>,
    zone: string,
    userZone: boolean,
  ): Promise<CalendarEventSummary[]> {
    const now = new Date(this.clock.now());

    const response = await this.http.get<GoogleEventsResponse>(calendarEventsUrl(PRIMARY_CALENDAR), {
      headers,
      params: {
        timeMin: now.toISOString(),
        timeMax: getEndOfLocalDay(zone, now).toISOString(),
        timeZone: zone,
        maxResults: MAX_EVENTS,
        singleEvents: true,
        orderBy: 'startTime',
      },
    });

    const events: CalendarEventSummary[] = [];
    for (const item of response.data.items ?? []) {
      // All-day events only carry a date, and have no useful clock time
      const start = item.start?.dateTime;
      if (!start) continue;

      const displayZone = userZone ? zone : resolveTimezone(item.start?.timeZone, zone);
      events.push({
        title: item.summary ?? 'Untitled Event',
        time: formatTimeOfDay(displayZone, new Date(start)),
        startDate: new Date(start).toISOString(),
        attendees: attendeeNames(item.attendees),
      });
    }

    return events;
  }

  private async fetchUnreadEmails(headers: Record<string, string>, zone: string): Promise<EmailSummary> {
    const list = await this.http.get<GmailListResponse>(GMAIL_MESSAGES_URL, {
      headers,
      params: { q: UNREAD_QUERY, maxResults: MAX_RECENT_EMAILS },
    });

    const refs = list.data.messages ?? [];
    const recentEmails = await Promise.all(
      refs.map(async (ref): Promise<EmailPreview> => {
        const message = await this.http.get<GmailMessage>(`${GMAIL_MESSAGES_URL}/${ref.id}`, {
          headers,
          params: { format: 'metadata', metadataHeaders: ['From', 'Subject', 'Date'] },
          paramsSerializer: { indexes: null },
        });

        const messageHeaders = message.data.payload?.headers ?? [];
        const date = headerValue(messageHeaders, 'Date');
        const parsedDate = date ? new Date(date) : null;

        return {
          sender: parseSenderName(headerValue(messageHeaders, 'From') ?? 'Unknown'),
          subject: headerValue(messageHeaders, 'Subject') ?? 'No Subject',
          time:
            parsedDate && !Number.isNaN(parsedDate.getTime())
              ? formatTimeOfDay(zone, parsedDate)
              : 'Recently',
        };
      }),
    );

    return {
      unreadCount: Math.max(list.data.resultSizeEstimate ?? 0, refs.length),
      recentEmails,
    };
  }

  private async refreshAccessToken(credentials: GoogleCredentials): Promise<GoogleCredentials> {
    const body = new URLSearchParams({
      client_id: this.clientId,
      client_secret: this.clientSecret,
      refresh_token: credentials.refreshToken ?? '',
      grant_type: 'refresh_token',
    });

    try {
      const response = await this.http.post<TokenRefreshResponse>(TOKEN_URL, body.toString(), {
        headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
      });
      return { ...credentials, accessToken: response.data.access_token };
    } catch (error) {
      throw this.wrapError(error);
    }
  }

  /**
   * Wrap errors in FeedUnavailableError
   */
  private wrapError(error: unknown): FeedUnavailableError {
    if (error instanceof FeedUnavailableError) {
      return error;
    }

    if (axios.isAxiosError(error)) {
      const status = error.response?.status;

      if (!error.response) {
        return new FeedUnavailableError(this.providerId, `network error (${error.code ?? 'unknown'})`, true, error);
      }
      if (status === 401 || status === 403) {
        return new FeedUnavailableError(this.providerId, 'unauthenticated', false, error);
      }
      if (status === 429) {
        return new FeedUnavailableError(this.providerId, 'rate limited', true, error);
      }
      return new FeedUnavailableError(this.providerId, `HTTP ${status}`, status !== undefined && status >= 500, error);
    }

    const wrapped = error instanceof Error ? error : new Error(String(error));
    return new FeedUnavailableError(this.providerId, wrapped.message, true, wrapped);
  }
}

function isUnauthorized(error: unknown): boolean {
  return error instanceof AxiosError && error.response?.status === 401;
}
