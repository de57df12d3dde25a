// =====================================================
// Live Activity Types
// =====================================================
// Shape of the content rendered by the on-device live activity.
// Field names are read directly by the widget extension, so they
// must not be renamed without shipping a client update.

/**
 * Content categories cycled through on successive dispatches.
 * Order matters: the rotation index selects `CONTENT_SLOTS[index % length]`.
 */
export const CONTENT_SLOTS = ['dashboard', 'news', 'weather', 'calendar', 'email'] as const;

export type ContentSlot = (typeof CONTENT_SLOTS)[number];

/**
 * Content-state dictionary carried in the `content-state` key of a
 * live activity push.
 */
export interface ContentState {
  callStatus: string;
  duration: number;
  transcript: string;
  isSpeaking: boolean;
  companionMode: string;
  isIdleMode?: boolean;
  isDarkMode?: boolean;
  currentDate?: string;
  intelligentIslandType?: ContentSlot;
  suggestion?: string;
  suggestionIcon?: string;

  // Calendar
  nextEventTitle?: string;
  nextEventTime?: string;

  // Email
  unreadEmailCount?: number;
  topEmailSenders?: string;
  topEmailSubject?: string;
  topEmailTime?: string;

  // Weather
  weatherTemp?: number;
  weatherCondition?: string;
  weatherIcon?: string;
  sunriseTime?: string;
  sunsetTime?: string;
  locationName?: string;

  // Connection flags
  isGoogleConnected?: boolean;
}

/**
 * Caller-supplied content for an out-of-cycle update. The widget tolerates
 * unknown keys, so arbitrary JSON values are passed through untouched.
 */
export type ContentStateInput = Record<string, unknown>;

/**
 * Live activity push event marker. The relay only updates running activities.
 */
export type LiveActivityEvent = 'update';
