// =====================================================
// Placeholder Content
// =====================================================
// Deterministic per-slot content used when neither the device
// nor the feed has data for a slot.

import type { ContentSlot, ContentState } from '@activity-relay/shared-types';

export type SlotContent = Partial<
  Pick<
    ContentState,
    | 'suggestion'
    | 'suggestionIcon'
    | 'nextEventTitle'
    | 'nextEventTime'
    | 'unreadEmailCount'
  >
>;

export const PLACEHOLDER_CONTENT: Readonly<Record<ContentSlot, SlotContent>> = {
  dashboard: {
    suggestion: 'Your day at a glance',
    suggestionIcon: 'calendar',
  },
  news: {
    suggestion: 'Check latest updates',
    suggestionIcon: 'newspaper.fill',
  },
  weather: {
    suggestion: 'Check the forecast',
    suggestionIcon: 'cloud.sun.fill',
  },
  calendar: {
    suggestion: 'Your calendar is clear',
    suggestionIcon: 'calendar',
    nextEventTitle: 'No upcoming events',
    nextEventTime: '--',
  },
  email: {
    suggestion: 'Inbox is quiet',
    suggestionIcon: 'envelope',
    unreadEmailCount: 0,
  },
};
