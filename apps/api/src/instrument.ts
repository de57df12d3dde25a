// =====================================================
// Sentry Instrumentation
// =====================================================
// Must be imported before any other application code.
// Initializes Sentry error tracking for the API.

import * as Sentry from '@sentry/node';
import { config } from './config';

if (config.sentry.dsn) {
  Sentry.init({
    dsn: config.sentry.dsn,
    environment: config.sentry.environment,
    release: `activity-relay-api@${config.version}`,
    tracesSampleRate: config.nodeEnv === 'production' ? 0.1 : 1.0,
    sendDefaultPii: false,
    beforeSend(event) {
      // Device tokens and user emails stay out of error reports
      if (event.user) {
        delete event.user.email;
        delete event.user.ip_address;
      }
      if (event.request?.data) {
        delete event.request.data;
      }
      return event;
    },
  });
}
