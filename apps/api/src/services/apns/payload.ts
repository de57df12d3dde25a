// =====================================================
// Live Activity Payload Builder
// =====================================================

import type { ContentState, ContentStateInput } from '@activity-relay/shared-types';
import type { LiveActivityPayload } from './types';

export function buildLiveActivityPayload(
  contentState: ContentState | ContentStateInput,
  timestamp: number,
): LiveActivityPayload {
  return {
    aps: {
      timestamp,
      event: 'update',
      'content-state': contentState,
    },
  };
}
