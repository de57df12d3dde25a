// =====================================================
// Device Types
// =====================================================
// Request/response contracts for device registration and
// state sync between the mobile client and the relay.

import type { ContentSlot } from './live-activity.types';

/**
 * A calendar event as synced from the device or fetched from the feed.
 */
export interface CalendarEventSummary {
  title: string;
  /** Display time, e.g. "2:30 PM" */
  time: string;
  /** ISO start timestamp, when known */
  startDate?: string;
  attendees?: string;
}

/**
 * A single email header triple shown in the email slot.
 */
export interface EmailPreview {
  sender: string;
  subject: string;
  time: string;
}

export interface EmailSummary {
  unreadCount: number;
  recentEmails: EmailPreview[];
}

export interface WeatherSnapshot {
  temp?: number;
  condition?: string;
  icon?: string;
  sunrise?: string;
  sunset?: string;
  location?: string;
}

/**
 * OAuth credentials the client hands over so the relay can read
 * calendar and mail on the user's behalf.
 */
export interface GoogleCredentials {
  accessToken: string;
  refreshToken?: string;
}

export interface RegisterDeviceRequest {
  deviceToken: string;
  activityId: string;
  liveActivityPushToken?: string;
  googleCredentials?: GoogleCredentials;
}

export interface UnregisterDeviceRequest {
  deviceToken: string;
}

export interface UpdateLiveActivityRequest {
  deviceToken: string;
  activityId: string;
  contentState: Record<string, unknown>;
}

export interface SyncStateRequest {
  deviceToken: string;
  calendarEvents?: CalendarEventSummary[];
  emailSummary?: EmailSummary;
  weather?: WeatherSnapshot;
  timezone?: string;
}

export interface RegisterDeviceResponse {
  message: string;
  monitoringEnabled: boolean;
  deviceCount: number;
}

/**
 * Public view of a registration. Tokens are truncated.
 */
export interface DeviceListItem {
  deviceToken: string;
  activityId: string;
  userId: string | null;
  rotationIndex: number;
  currentSlot: ContentSlot;
  registeredAt: string;
  lastUpdateAt: string | null;
  hasCalendarData: boolean;
  hasEmailData: boolean;
}

export interface DeviceListResponse {
  count: number;
  devices: DeviceListItem[];
}

export interface HealthResponse {
  status: 'healthy' | 'degraded';
  version: string;
  uptime: number;
  timestamp: string;
  activeDevices: number;
  monitoredUsers: number;
  scheduler: 'idle' | 'running-tick' | 'stopped';
}
