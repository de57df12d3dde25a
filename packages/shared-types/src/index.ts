// =====================================================
// Activity Relay Shared Types
// =====================================================

export * from './api.types';
export * from './live-activity.types';
export * from './device.types';
