// =====================================================
// Dispatch - Barrel Export
// =====================================================

export { DispatchScheduler, slotForRotation } from './dispatch.scheduler';
export type { DispatchSchedulerOptions, SchedulerState, TickSummary } from './dispatch.scheduler';
