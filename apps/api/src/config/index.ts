// =====================================================
// Application Configuration
// =====================================================

function intFromEnv(key: string, fallback: number): number {
  const raw = process.env[key];
  if (!raw) return fallback;
  const parsed = parseInt(raw, 10);
  return Number.isNaN(parsed) ? fallback : parsed;
}

export const config = {
  // Server
  nodeEnv: process.env.NODE_ENV || 'development',
  port: intFromEnv('PORT', 8000),
  version: process.env.npm_package_version || '1.0.0',

  // Client authentication (tokens issued by the companion auth service)
  jwt: {
    accessSecret: process.env.JWT_SECRET || 'dev-access-secret',
  },

  // Rate Limiting
  rateLimit: {
    windowMs: 60 * 1000, // 1 minute
    max: 10, // 10 device mutations per window
  },

  // Push gateway
  apns: {
    keyId: process.env.APNS_KEY_ID || '',
    teamId: process.env.APNS_TEAM_ID || '',
    bundleId: process.env.APNS_BUNDLE_ID || '',
    keyPath: process.env.APNS_KEY_PATH || '',
    keyBase64: process.env.APNS_KEY_BASE64 || '',
    environment: process.env.APNS_ENVIRONMENT || 'development',
    requestTimeoutMs: intFromEnv('APNS_TIMEOUT_MS', 10_000),
  },

  // Rotation scheduler
  scheduler: {
    rotationIntervalMs: intFromEnv('ROTATION_INTERVAL_MS', 20_000),
  },

  // Calendar / mail feed
  feed: {
    refreshIntervalMs: intFromEnv('FEED_REFRESH_INTERVAL_MS', 5 * 60 * 1000),
    googleClientId: process.env.GOOGLE_CLIENT_ID || '',
    googleClientSecret: process.env.GOOGLE_CLIENT_SECRET || '',
    webhookUrl: process.env.WEBHOOK_URL || '',
  },

  // Error tracking
  sentry: {
    dsn: process.env.SENTRY_DSN || '',
    environment: process.env.SENTRY_ENVIRONMENT || process.env.NODE_ENV || 'development',
  },
} as const;

// Validate required environment variables
export function validateConfig(): void {
  const required = ['JWT_SECRET', 'APNS_KEY_ID', 'APNS_TEAM_ID', 'APNS_BUNDLE_ID'];

  for (const key of required) {
    if (!process.env[key]) {
      console.warn(`Warning: Missing environment variable: ${key}`);
    }
  }
}
