// =====================================================
// Content Feed Types
// =====================================================

import type { CalendarEventSummary, EmailSummary, GoogleCredentials } from '@activity-relay/shared-types';

/**
 * Calendar and mail data for one user at one point in time.
 */
export interface FeedSnapshot {
  calendarEvents: CalendarEventSummary[];
  emailSummary: EmailSummary;
  fetchedAt: Date;
}

export interface FeedFetchResult {
  snapshot: FeedSnapshot;
  /** Credentials after any access-token refresh performed during the fetch */
  credentials: GoogleCredentials;
}

export interface CalendarWatchRequest {
  channelId: string;
  /** HTTPS address the provider posts change notifications to */
  address: string;
  calendarId: string;
}

export interface CalendarChannel {
  channelId: string;
  resourceId: string | null;
  expiresAt: Date | null;
}

/**
 * An external calendar/mail source.
 * Implementations throw FeedUnavailableError when the source cannot be read.
 */
export interface FeedProvider {
  readonly providerId: string;
  readonly providerName: string;

  isConfigured(): boolean;
  /**
   * @param timezone - IANA zone the user's day and clock times are taken in
   */
  fetchSnapshot(credentials: GoogleCredentials, timezone?: string): Promise<FeedFetchResult>;

  /**
   * Subscribe to change notifications for a calendar. Providers without
   * push support leave this out, and their users are only polled.
   */
  watchCalendar?(credentials: GoogleCredentials, request: CalendarWatchRequest): Promise<CalendarChannel>;
}

/**
 * Read side of the feed cache, as seen by the content source.
 */
export interface FeedReader {
  getSnapshot(userId: string): FeedSnapshot | null;
}
