import * as Sentry from '@sentry/node';

// Error tracking is only enabled when a DSN is provided
const sentryDsn = process.env.SENTRY_DSN || '';
const sentryEnabled = !!sentryDsn;

if (sentryEnabled) {
  Sentry.init({
    dsn: sentryDsn,
    environment: process.env.SENTRY_ENVIRONMENT || 'development',
    sampleRate: 1.0,
    tracesSampleRate: 0.1,
    serverName: process.env.SENTRY_SERVER_NAME || 'listing-price-tracker-local',
  });
}

export function captureError(error: Error, context?: Record<string, unknown>): void {
  if (!sentryEnabled) return;

  Sentry.withScope((scope) => {
    if (context) {
      scope.setExtras(context);
    }
    Sentry.captureException(error);
  });
}

/**
 * Monitor settings for the scheduled multi-model scrape (Sentry Crons)
 */
export interface CronMonitorConfig {
  monitorSlug: string;
  schedule: string;
  /** Maximum expected runtime in minutes */
  maxRuntimeMinutes?: number;
  /** Grace period in minutes before a missed check-in alerts */
  checkinMarginMinutes?: number;
}

/**
 * Mark a scheduled job as in progress.
 * Returns the check-in id, or null when Sentry is disabled.
 */
export function startCronCheckIn(config: CronMonitorConfig): string | null {
  if (!sentryEnabled) return null;

  return Sentry.captureCheckIn(
    {
      monitorSlug: config.monitorSlug,
      status: 'in_progress',
    },
    {
      schedule: {
        type: 'crontab',
        value: config.schedule,
      },
      checkinMargin: config.checkinMarginMinutes,
      maxRuntime: config.maxRuntimeMinutes,
    }
  );
}

export function finishCronCheckIn(
  checkInId: string | null,
  monitorSlug: string,
  status: 'ok' | 'error'
): void {
  if (!sentryEnabled || !checkInId) return;

  Sentry.captureCheckIn({
    checkInId,
    monitorSlug,
    status,
  });
}
