// =====================================================
// Global Test Setup
// =====================================================
// Runs before every test file, ahead of any application
// import, so the config module reads these values.

// Force NODE_ENV to test
process.env.NODE_ENV = 'test';

// Placeholder secret; tokens are signed with it by the API helper
process.env.JWT_SECRET = 'test-secret';

// No outbound integrations during tests
delete process.env.SENTRY_DSN;
delete process.env.WEBHOOK_URL;
delete process.env.GOOGLE_CLIENT_ID;
delete process.env.GOOGLE_CLIENT_SECRET;

// Suppress verbose logs during tests (unless DEBUG is set)
if (!process.env.DEBUG) {
  process.env.LOG_LEVEL = 'error';
}
