import 'dotenv/config';
import * as Sentry from '@sentry/node';

// Without SENTRY_DSN the SDK stays disabled.
Sentry.init({
  dsn: process.env.SENTRY_DSN,
  environment: process.env.NODE_ENV || 'development',
  tracesSampleRate: 1.0,
  beforeSend(event) {
    // Add memory info to all events
    const mem = process.memoryUsage();
    event.contexts = {
      ...event.contexts,
      memory: {
        heap_used_mb: Math.round(mem.heapUsed / 1024 / 1024),
        rss_mb: Math.round(mem.rss / 1024 / 1024),
      },
    };
    return event;
  },
});

process.on('unhandledRejection', (reason) => {
  console.error('Unhandled rejection:', reason);
  Sentry.captureException(reason);
});

process.on('uncaughtException', (error) => {
  console.error('Uncaught exception:', error);
  Sentry.captureException(error);
});

export { Sentry };
