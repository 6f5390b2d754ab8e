import * as Sentry from '@sentry/nestjs';
import { env } from 'process';

// Must run before any other module is loaded.
Sentry.init({
  dsn: env.SENTRY_DSN,
  environment: env.NODE_ENV || 'development',
  enabled: Boolean(env.SENTRY_DSN),
  tracesSampleRate: Number(env.SENTRY_TRACES_SAMPLE_RATE || 0),
});
