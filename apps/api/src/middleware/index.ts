// =====================================================
// Middleware Barrel Export
// =====================================================

export * from './auth.middleware';
export * from './rate-limit.middleware';
export * from './request-id.middleware';
export * from './error.middleware';
