// =====================================================
// API Types - Request/Response Contracts
// =====================================================

// Standard API response envelope
export interface ApiResponse<T = unknown> {
  success: boolean;
  data?: T;
  error?: ApiError;
  meta?: ResponseMeta;
}

export interface ApiError {
  code: string;
  message: string;
  details?: unknown;
}

export interface ResponseMeta {
  timestamp: string;
  requestId: string;
}

// Error codes
export const ERROR_CODES = {
  // Auth errors
  TOKEN_EXPIRED: 'AUTH_001',
  TOKEN_INVALID: 'AUTH_002',

  // Device errors
  DEVICE_NOT_FOUND: 'DEVICE_001',
  DEVICE_NOT_OWNED: 'DEVICE_003',

  // Push gateway errors
  PUSH_DELIVERY_FAILED: 'PUSH_001',

  // Content feed errors
  FEED_UNAVAILABLE: 'FEED_001',

  // Configuration errors
  CONFIGURATION_ERROR: 'CONFIG_001',

  // Generic errors
  VALIDATION_ERROR: 'VALIDATION_001',
  INTERNAL_ERROR: 'INTERNAL_001',
  NOT_FOUND: 'NOT_FOUND_001',
  RATE_LIMITED: 'RATE_001',
  FORBIDDEN: 'FORBIDDEN_001',
} as const;

export type ErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES];
