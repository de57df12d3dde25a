// =====================================================
// Content - Barrel Export
// =====================================================

export { ContentSource } from './content.source';
export { FeedRefresher } from './feed.refresher';
export type { ChannelNotificationOutcome, FeedChangeHandler, FeedRefresherOptions } from './feed.refresher';
export { GoogleFeedProvider, parseSenderName } from './feeds/google.feed';
export type { GoogleFeedOptions } from './feeds/google.feed';
export type {
  CalendarChannel,
  CalendarWatchRequest,
  FeedFetchResult,
  FeedProvider,
  FeedReader,
  FeedSnapshot,
} from './feeds/types';
export { PLACEHOLDER_CONTENT } from './placeholders';
export type { SlotContent } from './placeholders';
export * from './timezone.utils';
