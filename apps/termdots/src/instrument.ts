import * as Sentry from '@sentry/node';

// Error reporting is opt-in for a CLI
if (process.env.SENTRY_DSN) {
  Sentry.init({
    dsn: process.env.SENTRY_DSN,
    environment: process.env.NODE_ENV || 'development',
    tracesSampleRate: 0,
    beforeSend(event) {
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
}

export { Sentry };
